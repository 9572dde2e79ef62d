import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { establishSession, handleChoice, runMenu, type MenuIO } from '../../src/cli/menu'
import { MENU } from '../../src/cli/render'
import { createHarness, SERVER, type Harness } from '../support/harness'

/**
 * Scripted terminal: answers prompts in order, and behaves like a closed
 * readline once the script runs out.
 */
function scriptedIO(answers: string[]) {
  const printed: string[] = []
  const io: MenuIO = {
    async prompt() {
      const answer = answers.shift()
      if (answer === undefined) {
        const closed = new Error('The operation was aborted')
        closed.name = 'AbortError'
        throw closed
      }
      return answer
    },
    print(line) {
      printed.push(line)
    }
  }
  return { io, printed }
}

describe('menu', () => {
  let harness: Harness

  beforeEach(() => {
    harness = createHarness()
  })

  afterEach(async () => {
    await harness.dispose()
  })

  describe('establishSession', () => {
    it('should greet a returning user without prompting', async () => {
      await harness.sessionStore('alice').save({ username: 'alice', firstName: 'Alice', server: SERVER, savedAt: 1 })
      const { io, printed } = scriptedIO([])

      expect(await establishSession(harness.createClient('alice'), io)).toBe(true)
      expect(printed).toEqual(['Welcome back Alice! Continuing as alice.'])
    })

    it('should prompt for an identity and connect', async () => {
      const { io, printed } = scriptedIO([' alice ', 'Alice'])

      expect(await establishSession(harness.createClient('alice'), io)).toBe(true)
      expect(printed).toEqual(['Welcome Alice! You are now connected.'])
      expect(harness.server.directory.lookup('alice')?.firstName).toBe('Alice')
    })

    it('should ask again after an empty answer', async () => {
      const { io, printed } = scriptedIO(['', 'alice', '', 'alice', 'Alice'])

      expect(await establishSession(harness.createClient('alice'), io)).toBe(true)
      expect(printed).toEqual([
        'Username cannot be empty',
        'First name cannot be empty',
        'Welcome Alice! You are now connected.'
      ])
    })

    it('should explain a taken username and let the user pick another', async () => {
      await harness.createClient('first').connect('alice', 'Alice')
      const { io, printed } = scriptedIO(['alice', 'Eve', 'eve', 'Eve'])

      expect(await establishSession(harness.createClient('eve'), io)).toBe(true)
      expect(printed).toEqual([
        'Failed to connect: Username "alice" is already in use (pick another username)',
        'Welcome Eve! You are now connected.'
      ])
    })

    it('should give up after the allowed attempts', async () => {
      const { io, printed } = scriptedIO(['', ''])

      expect(await establishSession(harness.createClient('quiet'), io, 2)).toBe(false)
      expect(printed).toEqual([
        'Username cannot be empty',
        'Username cannot be empty',
        'Failed to connect after 2 attempts'
      ])
    })
  })

  describe('handleChoice', () => {
    async function connected(name: string, firstName: string) {
      const client = harness.createClient(name)
      const result = await client.connect(name, firstName)
      if (!result.ok) throw result.error
      return client
    }

    it('should list users and mark the caller', async () => {
      const alice = await connected('alice', 'Alice')
      await connected('bob', 'Bob')
      const { io, printed } = scriptedIO([])

      expect(await handleChoice('1', alice, io)).toBe('continue')
      expect(printed).toEqual(['Online users:', '  alice (Alice) [you]', '  bob (Bob)'])
    })

    it('should send a message and show it to the recipient', async () => {
      const alice = await connected('alice', 'Alice')
      const bob = await connected('bob', 'Bob')
      const sender = scriptedIO(['bob', 'hello there'])
      const reader = scriptedIO([])

      await handleChoice('2', alice, sender.io)
      await handleChoice('3', bob, reader.io)

      expect(sender.printed).toEqual(['Message sent to bob'])
      expect(reader.printed).toHaveLength(4)
      expect(reader.printed[0]).toBe('--- Message 1 of 1 ---')
      expect(reader.printed[1]).toBe('From: alice')
      expect(reader.printed[2]).toMatch(/^Time: \d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} UTC$/)
      expect(reader.printed[3]).toBe('hello there')
    })

    it('should say when there is no mail', async () => {
      const bob = await connected('bob', 'Bob')
      const { io, printed } = scriptedIO([])

      await handleChoice('3', bob, io)

      expect(printed).toEqual(['No new messages'])
    })

    it('should not send to a blank recipient or a blank message', async () => {
      const alice = await connected('alice', 'Alice')
      const blankRecipient = scriptedIO(['  '])
      const blankBody = scriptedIO(['alice', '   '])

      await handleChoice('2', alice, blankRecipient.io)
      await handleChoice('2', alice, blankBody.io)

      expect(blankRecipient.printed).toEqual(['Invalid recipient username'])
      expect(blankBody.printed).toEqual(['Message is empty, nothing sent'])
      expect(harness.server.mailboxes.depth('alice')).toBe(0)
    })

    it('should explain an unknown recipient', async () => {
      const alice = await connected('alice', 'Alice')
      const { io, printed } = scriptedIO(['carol', 'hi'])

      await handleChoice('2', alice, io)

      expect(printed).toEqual(['Failed to send message: No such user "carol" (check the username with "List online users")'])
    })

    it('should reject unknown options and exit on 4', async () => {
      const alice = await connected('alice', 'Alice')
      const { io, printed } = scriptedIO([])

      expect(await handleChoice('7', alice, io)).toBe('continue')
      expect(await handleChoice(' 4 ', alice, io)).toBe('exit')
      expect(printed).toEqual(['Invalid option, choose 1-4', 'Goodbye!'])
    })
  })

  describe('runMenu', () => {
    it('should show the menu until the user exits', async () => {
      const alice = harness.createClient('alice')
      await alice.connect('alice', 'Alice')
      const { io, printed } = scriptedIO(['x', '4'])

      await runMenu(alice, io)

      expect(printed).toEqual([...MENU, 'Invalid option, choose 1-4', ...MENU, 'Goodbye!'])
    })

    it('should return quietly when input closes', async () => {
      const alice = harness.createClient('alice')
      const { io, printed } = scriptedIO([])

      await expect(runMenu(alice, io)).resolves.toBeUndefined()
      expect(printed).toEqual(MENU)
    })

    it('should pass on other errors', async () => {
      const alice = harness.createClient('alice')
      const io: MenuIO = {
        prompt: async () => {
          throw new Error('terminal exploded')
        },
        print: () => {}
      }

      await expect(runMenu(alice, io)).rejects.toThrow('terminal exploded')
    })
  })
})
