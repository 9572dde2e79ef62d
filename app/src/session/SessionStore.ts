import { readFile, rm } from 'fs/promises'
import * as path from 'path'
import { z } from 'zod'
import { isMissingFile, writeFileAtomic } from '@dgram-chat/shared'

export const SessionRecordSchema = z.object({
  username: z.string().min(1),
  firstName: z.string().min(1),
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535)
  }),
  savedAt: z.number().int().nonnegative()
})

export type SessionRecord = z.infer<typeof SessionRecordSchema>

export const DEFAULT_SESSION_FILE = path.join('.dgram-chat', 'session.json')

/**
 * Client-local identity kept across restarts, stored as a small JSON file.
 */
export class SessionStore {
  readonly filePath: string

  constructor(filePath: string = DEFAULT_SESSION_FILE) {
    this.filePath = path.resolve(filePath)
  }

  /**
   * Returns null when there is no usable record. A corrupt file is reported
   * and treated as absent.
   */
  async load(): Promise<SessionRecord | null> {
    let raw: string
    try {
      raw = await readFile(this.filePath, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) return null
      console.warn(`[SessionStore] Could not read ${this.filePath}:`, error)
      return null
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch {
      console.warn(`[SessionStore] ${this.filePath} is not valid JSON, ignoring it`)
      return null
    }

    const parsed = SessionRecordSchema.safeParse(json)
    if (!parsed.success) {
      console.warn(`[SessionStore] ${this.filePath} has an unexpected shape, ignoring it`)
      return null
    }
    return parsed.data
  }

  /**
   * Write via a temp file and rename, so a crash never leaves half a record.
   */
  async save(record: SessionRecord): Promise<void> {
    const valid = SessionRecordSchema.parse(record)
    await writeFileAtomic(this.filePath, JSON.stringify(valid, null, 2))
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true })
  }
}
