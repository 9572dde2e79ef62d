import { readFile } from 'fs/promises'
import * as path from 'path'
import { z } from 'zod'
import { isMissingFile, writeFileAtomic, type MailboxEntry } from '@dgram-chat/shared'

const MailboxEntrySchema = z.object({
  from: z.string().min(1),
  body: z.string(),
  sentAt: z.number().int().nonnegative()
})

export const MailboxSnapshotSchema = z.object({
  savedAt: z.number().int().nonnegative(),
  mailboxes: z.record(z.string().min(1), z.array(MailboxEntrySchema))
})

export type MailboxSnapshot = z.infer<typeof MailboxSnapshotSchema>

export const DEFAULT_MAILBOX_FILE = path.join('.dgram-chat', 'mailboxes.json')

/**
 * Undelivered messages kept on disk so a server restart does not lose them.
 * Only mailboxes are stored; users reconnect after a restart.
 */
export class MailboxFile {
  readonly filePath: string

  constructor(filePath: string = DEFAULT_MAILBOX_FILE) {
    this.filePath = path.resolve(filePath)
  }

  async load(): Promise<Record<string, MailboxEntry[]> | null> {
    let raw: string
    try {
      raw = await readFile(this.filePath, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) return null
      console.warn(`[MailboxFile] Could not read ${this.filePath}:`, error)
      return null
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch {
      console.warn(`[MailboxFile] ${this.filePath} is not valid JSON, starting with empty mailboxes`)
      return null
    }

    const parsed = MailboxSnapshotSchema.safeParse(json)
    if (!parsed.success) {
      console.warn(`[MailboxFile] ${this.filePath} has an unexpected shape, starting with empty mailboxes`)
      return null
    }
    return parsed.data.mailboxes
  }

  async save(mailboxes: Record<string, MailboxEntry[]>, now: number = Date.now()): Promise<void> {
    const snapshot: MailboxSnapshot = { savedAt: now, mailboxes }
    await writeFileAtomic(this.filePath, JSON.stringify(snapshot))
  }
}
