import { loadSimulationConfig } from './config'
import { UDPNetworkSimulator } from './network/UDPNetworkSimulator'
import { createControlApp } from './routes/control'

export { UDPNetworkSimulator, type ProxyStats } from './network/UDPNetworkSimulator'
export { createControlApp, createControlRoutes, NetworkConfigUpdateSchema, type ConfigurableNetwork } from './routes/control'
export { loadSimulationConfig, type SimulationConfig } from './config'

async function main() {
  console.log('Starting dgram-chat network simulator...')
  const config = loadSimulationConfig()

  const simulator = new UDPNetworkSimulator(config.port, config.upstream, config.conditions, Math.random, config.routeIdleMs)
  await simulator.start()

  const httpServer = createControlApp(simulator).listen(config.httpPort, () => {
    console.log(`Control API running on port ${config.httpPort}`)
    console.log('Available endpoints:')
    console.log('  GET  /health')
    console.log('  GET  /api/stats')
    console.log('  GET  /api/network-config')
    console.log('  POST /api/network-config')
  })

  const shutdown = (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`)
    httpServer.close()
    simulator.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error while stopping simulator:', error)
        process.exit(1)
      }
    )
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Failed to start simulator:', error instanceof Error ? error.message : error)
    process.exit(1)
  })
}
