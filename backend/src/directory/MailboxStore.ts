import type { MailboxEntry } from '@dgram-chat/shared'

/**
 * Per-recipient queues of undelivered messages.
 * Mailboxes outlive a disconnect so queued messages wait for the next session.
 */
export class MailboxStore {
  private mailboxes: Map<string, MailboxEntry[]> = new Map()

  constructor(private maxMailboxSize: number = 1000) {}

  enqueue(recipient: string, entry: MailboxEntry): boolean {
    const mailbox = this.mailboxes.get(recipient) ?? []
    if (mailbox.length >= this.maxMailboxSize) {
      return false
    }
    mailbox.push({ ...entry })
    this.mailboxes.set(recipient, mailbox)
    return true
  }

  peek(recipient: string): readonly MailboxEntry[] {
    return this.mailboxes.get(recipient) ?? []
  }

  /**
   * Remove and return the oldest `limit` entries (all of them by default).
   */
  drain(recipient: string, limit: number = Infinity): MailboxEntry[] {
    const mailbox = this.mailboxes.get(recipient)
    if (!mailbox) return []

    const drained = mailbox.splice(0, limit)
    if (mailbox.length === 0) {
      this.mailboxes.delete(recipient)
    }
    return drained
  }

  depth(recipient: string): number {
    return this.mailboxes.get(recipient)?.length ?? 0
  }

  depths(): Record<string, number> {
    const depths: Record<string, number> = {}
    for (const [recipient, mailbox] of this.mailboxes) {
      depths[recipient] = mailbox.length
    }
    return depths
  }

  /**
   * Copy of every non-empty mailbox, oldest entry first.
   */
  snapshot(): Record<string, MailboxEntry[]> {
    const snapshot: Record<string, MailboxEntry[]> = {}
    for (const [recipient, mailbox] of this.mailboxes) {
      snapshot[recipient] = mailbox.map(entry => ({ ...entry }))
    }
    return snapshot
  }

  /**
   * Replace all mailboxes. Entries past the size limit are dropped.
   * Returns the number of entries kept.
   */
  restore(mailboxes: Record<string, readonly MailboxEntry[]>): number {
    this.mailboxes.clear()
    let restored = 0
    for (const [recipient, entries] of Object.entries(mailboxes)) {
      const kept = entries.slice(0, this.maxMailboxSize).map(entry => ({ ...entry }))
      if (kept.length === 0) continue
      this.mailboxes.set(recipient, kept)
      restored += kept.length
    }
    return restored
  }
}
