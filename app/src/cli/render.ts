import type { ChatError, MailboxEntry, UserSummary } from '@dgram-chat/shared'

export const MENU = [
  '',
  '============ dgram-chat ============',
  '1. List online users',
  '2. Send message',
  '3. Check messages',
  '4. Exit',
  '===================================='
]

export function formatTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString().replace('T', ' ').slice(0, 19)
}

export function renderUsers(users: UserSummary[], self?: string): string[] {
  if (users.length === 0) {
    return ['No users online']
  }
  return [
    'Online users:',
    ...users.map(user => `  ${user.username} (${user.firstName})${user.username === self ? ' [you]' : ''}`)
  ]
}

export function renderMessages(messages: MailboxEntry[]): string[] {
  if (messages.length === 0) {
    return ['No new messages']
  }

  const lines: string[] = []
  messages.forEach((message, index) => {
    lines.push(`--- Message ${index + 1} of ${messages.length} ---`)
    lines.push(`From: ${message.from}`)
    lines.push(`Time: ${formatTimestamp(message.sentAt)} UTC`)
    lines.push(message.body)
  })
  return lines
}

const FAILURE_HINTS: Partial<Record<ChatError['code'], string>> = {
  DELIVERY_FAILED: 'the server did not answer, try again later',
  USERNAME_TAKEN: 'pick another username',
  UNKNOWN_RECIPIENT: 'check the username with "List online users"'
}

export function renderFailure(action: string, error: ChatError): string {
  const hint = FAILURE_HINTS[error.code]
  return `Failed to ${action}: ${error.message}${hint ? ` (${hint})` : ''}`
}
