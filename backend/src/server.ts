import type { Server } from 'http'
import { UDPTransport } from '@dgram-chat/shared'
import { loadServerConfig } from './config'
import { createAdminApp } from './routes/admin'
import { ChatServer } from './server/ChatServer'
import { MailboxFile } from './storage/MailboxFile'

async function main() {
  const config = loadServerConfig()

  const transport = new UDPTransport('ChatServer')
  await transport.bind(config.port, config.host)

  const server = new ChatServer(transport, {
    dedupWindow: config.dedupWindow,
    maxMailboxSize: config.maxMailboxSize,
    userTtlMs: config.userTtlMs,
    evictionIntervalMs: config.evictionIntervalMs,
    mailboxFile: config.mailboxFile === null ? null : new MailboxFile(config.mailboxFile)
  })
  await server.restoreMailboxes()
  server.start()

  let httpServer: Server | null = null
  if (config.adminPort > 0) {
    httpServer = createAdminApp(server).listen(config.adminPort, () => {
      console.log(`[Server] Admin API on http://localhost:${config.adminPort}/api/health`)
    })
  }

  const shutdown = async (signal: string) => {
    console.log(`\n[Server] ${signal} received, shutting down...`)
    httpServer?.close()
    try {
      await server.stop()
      process.exit(0)
    } catch (error) {
      console.error('[Server] Error during shutdown:', error)
      process.exit(1)
    }
  }

  process.on('SIGINT', () => void shutdown('SIGINT'))
  process.on('SIGTERM', () => void shutdown('SIGTERM'))
}

if (require.main === module) {
  main().catch((error) => {
    console.error('[Server] Failed to start:', error instanceof Error ? error.message : error)
    process.exit(1)
  })
}
