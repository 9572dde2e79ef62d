import express, { Router } from 'express'
import cors from 'cors'
import { z } from 'zod'
import type { NetworkConditions } from '@dgram-chat/shared'

/**
 * Anything whose conditions can be inspected and changed at run time:
 * the UDP proxy, or the in-memory NetworkSimulator.
 */
export interface ConfigurableNetwork {
  getConfig(): NetworkConditions
  updateConfig(config: Partial<NetworkConditions>): void
  getStats(): object
}

const rate = z.number().min(0).max(1)
const millis = z.number().min(0).max(60000)

export const NetworkConfigUpdateSchema = z.object({
  packetLossRate: rate,
  duplicateRate: rate,
  minLatency: millis,
  maxLatency: millis,
  jitter: millis
}).partial().strict()

export function createControlRoutes(network: ConfigurableNetwork) {
  const router = Router()

  router.get('/stats', (req, res) => {
    res.json(network.getStats())
  })

  router.get('/network-config', (req, res) => {
    res.json(network.getConfig())
  })

  router.post('/network-config', (req, res) => {
    const parsed = NetworkConfigUpdateSchema.safeParse(req.body)
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid network config', details: parsed.error.flatten() })
    }

    const next = { ...network.getConfig(), ...parsed.data }
    if (next.minLatency > next.maxLatency) {
      return res.status(400).json({ error: 'minLatency cannot exceed maxLatency' })
    }

    network.updateConfig(parsed.data)
    res.json({ success: true, config: network.getConfig() })
  })

  return router
}

export function createControlApp(network: ConfigurableNetwork): express.Application {
  const app = express()
  app.use(cors())
  app.use(express.json())

  app.get('/health', (req, res) => {
    res.json({ status: 'ok', service: 'simulation-service' })
  })
  app.use('/api', createControlRoutes(network))

  return app
}
