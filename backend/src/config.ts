import { z } from 'zod'
import { DEFAULT_MAILBOX_FILE } from './storage/MailboxFile'

const port = (fallback: number) => z.coerce.number().int().min(0).max(65535).default(fallback)

const ServerConfigSchema = z.object({
  CHAT_HOST: z.string().min(1).default('0.0.0.0'),
  CHAT_PORT: port(12000),
  ADMIN_PORT: port(12001),
  DEDUP_WINDOW: z.coerce.number().int().positive().default(32),
  USER_TTL_MS: z.coerce.number().int().nonnegative().default(30 * 60 * 1000),
  EVICTION_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 1000),
  MAX_MAILBOX_SIZE: z.coerce.number().int().positive().default(1000),
  MAILBOX_FILE: z.string().default(DEFAULT_MAILBOX_FILE)
})

export interface ServerConfig {
  host: string
  port: number
  /** 0 disables the admin HTTP API */
  adminPort: number
  dedupWindow: number
  userTtlMs: number
  evictionIntervalMs: number
  maxMailboxSize: number
  /** null keeps undelivered messages in memory only */
  mailboxFile: string | null
}

/**
 * Read server settings from the environment. Throws with every invalid
 * variable listed.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ServerConfigSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid server configuration:\n  ${problems.join('\n  ')}`)
  }

  const config = parsed.data
  return {
    host: config.CHAT_HOST,
    port: config.CHAT_PORT,
    adminPort: config.ADMIN_PORT,
    dedupWindow: config.DEDUP_WINDOW,
    userTtlMs: config.USER_TTL_MS,
    evictionIntervalMs: config.EVICTION_INTERVAL_MS,
    maxMailboxSize: config.MAX_MAILBOX_SIZE,
    mailboxFile: config.MAILBOX_FILE === '' ? null : config.MAILBOX_FILE
  }
}
