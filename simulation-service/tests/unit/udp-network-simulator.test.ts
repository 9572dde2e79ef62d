import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { UDPTransport, type Address, type NetworkConditions } from '@dgram-chat/shared'
import { UDPNetworkSimulator } from '../../src/network/UDPNetworkSimulator'

const ROUTE_IDLE_MS = 1000
const wait = (ms: number) => new Promise(resolve => setTimeout(resolve, ms))

async function waitFor(condition: () => boolean, timeoutMs: number = 2000) {
  const deadline = Date.now() + timeoutMs
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition')
    }
    await wait(5)
  }
}

describe('UDPNetworkSimulator over loopback', () => {
  let echoServer: UDPTransport
  let client: UDPTransport
  let proxy: UDPNetworkSimulator | null
  let serverReceived: string[]
  let clientReceived: string[]

  beforeEach(async () => {
    serverReceived = []
    clientReceived = []
    proxy = null

    echoServer = new UDPTransport('EchoServer')
    await echoServer.bind(0, '127.0.0.1')
    echoServer.onDatagram((payload, source) => {
      serverReceived.push(payload.toString())
      void echoServer.send(Buffer.from(`echo:${payload.toString()}`), source)
    })

    client = new UDPTransport('Client')
    await client.bind(0, '127.0.0.1')
    client.onDatagram(payload => clientReceived.push(payload.toString()))
  })

  afterEach(async () => {
    await proxy?.stop()
    await client.close()
    await echoServer.close()
  })

  // random() always returns 0.5: loss and duplication are all-or-nothing
  async function startProxy(conditions: Partial<NetworkConditions> = {}): Promise<Address> {
    const started = new UDPNetworkSimulator(0, echoServer.address(), conditions, () => 0.5, ROUTE_IDLE_MS)
    proxy = started
    await started.start()
    return { host: '127.0.0.1', port: started.address().port }
  }

  it('should forward a request and its reply', async () => {
    const address = await startProxy()

    await client.send(Buffer.from('ping'), address)
    await waitFor(() => clientReceived.length === 1 && proxy?.getStats().packetsForwarded === 2)

    expect(serverReceived).toEqual(['ping'])
    expect(clientReceived).toEqual(['echo:ping'])
    expect(proxy?.getStats()).toMatchObject({
      packetsReceived: 2,
      packetsForwarded: 2,
      packetsDropped: 0,
      packetsDuplicated: 0,
      clients: [{ address: `127.0.0.1:${client.address().port}` }]
    })
  })

  it('should count dropped packets', async () => {
    const address = await startProxy({ packetLossRate: 1 })

    await client.send(Buffer.from('ping'), address)
    await waitFor(() => proxy?.getStats().packetsReceived === 1)
    await wait(50)

    expect(serverReceived).toEqual([])
    expect(clientReceived).toEqual([])
    expect(proxy?.getStats()).toMatchObject({ packetsReceived: 1, packetsForwarded: 0, packetsDropped: 1 })
  })

  it('should duplicate packets in both directions', async () => {
    const address = await startProxy({ duplicateRate: 1 })

    await client.send(Buffer.from('ping'), address)
    await waitFor(() => clientReceived.length === 4 && proxy?.getStats().packetsForwarded === 6)

    expect(serverReceived).toEqual(['ping', 'ping'])
    expect(clientReceived).toEqual(['echo:ping', 'echo:ping', 'echo:ping', 'echo:ping'])
    expect(proxy?.getStats()).toMatchObject({
      packetsReceived: 3,
      packetsForwarded: 6,
      packetsDuplicated: 3
    })
  })

  it('should close idle routes and open a new one on the next packet', async () => {
    const address = await startProxy()
    const clientKey = `127.0.0.1:${client.address().port}`

    await client.send(Buffer.from('one'), address)
    await waitFor(() => clientReceived.length === 1)

    expect(proxy?.pruneIdleRoutes(Date.now())).toEqual([])
    expect(proxy?.pruneIdleRoutes(Date.now() + ROUTE_IDLE_MS + 1)).toEqual([clientKey])
    expect(proxy?.getStats().clients).toEqual([])

    await client.send(Buffer.from('two'), address)
    await waitFor(() => clientReceived.length === 2)

    expect(clientReceived).toEqual(['echo:one', 'echo:two'])
    expect(proxy?.getStats().clients.map(route => route.address)).toEqual([clientKey])
  })
})
