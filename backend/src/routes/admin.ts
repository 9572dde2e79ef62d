import express, { Router } from 'express'
import cors from 'cors'
import type { ChatServer } from '../server/ChatServer'

export function createAdminRoutes(server: ChatServer) {
  const router = Router()

  router.get('/health', (req, res) => {
    const stats = server.getStats()
    res.json({
      status: 'ok',
      users: stats.users,
      uptimeMs: stats.uptimeMs
    })
  })

  router.get('/stats', (req, res) => {
    res.json(server.getStats())
  })

  // Addresses stay private to the server
  router.get('/users', (req, res) => {
    const users = server.directory.list().map(user => ({
      username: user.username,
      firstName: user.firstName,
      connectedAt: user.connectedAt,
      lastSeen: user.lastSeen,
      pendingMessages: server.mailboxes.depth(user.username)
    }))
    res.json({ users })
  })

  return router
}

/**
 * Read-only HTTP view of the directory server
 */
export function createAdminApp(server: ChatServer): express.Application {
  const app = express()
  app.use(cors())
  app.use(express.json())
  app.use('/api', createAdminRoutes(server))

  app.use((req, res) => {
    res.status(404).json({ error: 'Not found' })
  })

  return app
}
