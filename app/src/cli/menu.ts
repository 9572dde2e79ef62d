import type { ChatClient } from '../client/ChatClient'
import { MENU, renderFailure, renderMessages, renderUsers } from './render'

export interface MenuIO {
  prompt(question: string): Promise<string>
  print(line: string): void
}

export type MenuOutcome = 'continue' | 'exit'

/**
 * Resume the saved session or ask for an identity, up to `maxAttempts` times.
 */
export async function establishSession(client: ChatClient, io: MenuIO, maxAttempts: number = 3): Promise<boolean> {
  const resumed = await client.resume()
  if (resumed) {
    io.print(`Welcome back ${resumed.firstName}! Continuing as ${resumed.username}.`)
    return true
  }

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const username = (await io.prompt('Enter username: ')).trim()
    if (!username) {
      io.print('Username cannot be empty')
      continue
    }
    const firstName = (await io.prompt('Enter your first name: ')).trim()
    if (!firstName) {
      io.print('First name cannot be empty')
      continue
    }

    const result = await client.connect(username, firstName)
    if (result.ok) {
      io.print(`Welcome ${result.value.firstName}! You are now connected.`)
      return true
    }
    io.print(renderFailure('connect', result.error))
    if (result.error.code === 'CANCELLED') return false
  }

  io.print(`Failed to connect after ${maxAttempts} attempts`)
  return false
}

export async function handleChoice(choice: string, client: ChatClient, io: MenuIO): Promise<MenuOutcome> {
  switch (choice.trim()) {
    case '1': {
      const result = await client.listUsers()
      if (result.ok) {
        renderUsers(result.value, client.currentSession?.username).forEach(line => io.print(line))
      } else {
        io.print(renderFailure('list users', result.error))
      }
      return 'continue'
    }

    case '2': {
      const recipient = (await io.prompt('Recipient username: ')).trim()
      if (!recipient) {
        io.print('Invalid recipient username')
        return 'continue'
      }
      const body = await io.prompt('Message: ')
      if (!body.trim()) {
        io.print('Message is empty, nothing sent')
        return 'continue'
      }
      const result = await client.sendMessage(recipient, body)
      io.print(result.ok ? `Message sent to ${recipient}` : renderFailure('send message', result.error))
      return 'continue'
    }

    case '3': {
      const result = await client.retrieveMessages()
      if (result.ok) {
        renderMessages(result.value).forEach(line => io.print(line))
      } else {
        io.print(renderFailure('retrieve messages', result.error))
      }
      return 'continue'
    }

    case '4':
      io.print('Goodbye!')
      return 'exit'

    default:
      io.print('Invalid option, choose 1-4')
      return 'continue'
  }
}

export function isInputClosed(error: unknown): boolean {
  if (!(error instanceof Error)) return false
  return error.name === 'AbortError' || ('code' in error && error.code === 'ERR_USE_AFTER_CLOSE')
}

/**
 * Show the menu until the user exits. Returns quietly when input is closed
 * or aborted by shutdown.
 */
export async function runMenu(client: ChatClient, io: MenuIO): Promise<void> {
  for (;;) {
    MENU.forEach(line => io.print(line))

    try {
      const choice = await io.prompt('Enter your choice (1-4): ')
      if (await handleChoice(choice, client, io) === 'exit') return
    } catch (error) {
      if (isInputClosed(error)) return
      throw error
    }
  }
}
