import { Command } from 'commander'
import { z } from 'zod'
import { DEFAULT_SESSION_FILE } from './session/SessionStore'

const ClientConfigSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535),
  timeout: z.coerce.number().int().positive(),
  retries: z.coerce.number().int().nonnegative(),
  sessionFile: z.string().min(1)
})

export interface ClientConfig {
  host: string
  port: number
  timeoutMs: number
  maxRetries: number
  sessionFile: string
}

/**
 * Command line options win over CHAT_* environment variables, which win
 * over the built-in defaults.
 */
export function parseClientConfig(args: string[], env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const program = new Command()
    .name('dgram-chat')
    .description('Chat over UDP through a dgram-chat directory server')
    .option('--host <host>', 'server host', env.CHAT_SERVER_HOST ?? 'localhost')
    .option('--port <port>', 'server UDP port', env.CHAT_SERVER_PORT ?? '12000')
    .option('--timeout <ms>', 'wait per attempt before retransmitting', env.CHAT_TIMEOUT_MS ?? '2000')
    .option('--retries <count>', 'retransmissions before giving up', env.CHAT_MAX_RETRIES ?? '3')
    .option('--session-file <path>', 'where the saved session lives', env.CHAT_SESSION_FILE ?? DEFAULT_SESSION_FILE)
    .exitOverride()

  program.parse(args, { from: 'user' })

  const parsed = ClientConfigSchema.safeParse(program.opts())
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `--${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid client options:\n  ${problems.join('\n  ')}`)
  }

  return {
    host: parsed.data.host,
    port: parsed.data.port,
    timeoutMs: parsed.data.timeout,
    maxRetries: parsed.data.retries,
    sessionFile: parsed.data.sessionFile
  }
}
