import { z } from 'zod'
import type { Address, NetworkConditions } from '@dgram-chat/shared'

const port = (fallback: number) => z.coerce.number().int().min(1).max(65535).default(fallback)
const rate = z.coerce.number().min(0).max(1).default(0)
const millis = (fallback: number) => z.coerce.number().min(0).default(fallback)

const SimulationConfigSchema = z.object({
  SIM_PORT: port(12100),
  SIM_HTTP_PORT: port(12101),
  SIM_UPSTREAM_HOST: z.string().min(1).default('127.0.0.1'),
  SIM_UPSTREAM_PORT: port(12000),
  SIM_PACKET_LOSS: rate,
  SIM_DUPLICATE_RATE: rate,
  SIM_MIN_LATENCY: millis(10),
  SIM_MAX_LATENCY: millis(100),
  SIM_JITTER: millis(20),
  SIM_ROUTE_IDLE_MS: z.coerce.number().int().min(0).default(5 * 60 * 1000)
})

export interface SimulationConfig {
  port: number
  httpPort: number
  upstream: Address
  conditions: NetworkConditions
  /** 0 keeps client routes open until shutdown */
  routeIdleMs: number
}

export function loadSimulationConfig(env: NodeJS.ProcessEnv = process.env): SimulationConfig {
  const parsed = SimulationConfigSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid simulation configuration:\n  ${problems.join('\n  ')}`)
  }

  const config = parsed.data
  if (config.SIM_MIN_LATENCY > config.SIM_MAX_LATENCY) {
    throw new Error('Invalid simulation configuration:\n  SIM_MIN_LATENCY cannot exceed SIM_MAX_LATENCY')
  }

  return {
    port: config.SIM_PORT,
    httpPort: config.SIM_HTTP_PORT,
    upstream: { host: config.SIM_UPSTREAM_HOST, port: config.SIM_UPSTREAM_PORT },
    conditions: {
      packetLossRate: config.SIM_PACKET_LOSS,
      duplicateRate: config.SIM_DUPLICATE_RATE,
      minLatency: config.SIM_MIN_LATENCY,
      maxLatency: config.SIM_MAX_LATENCY,
      jitter: config.SIM_JITTER
    },
    routeIdleMs: config.SIM_ROUTE_IDLE_MS
  }
}
