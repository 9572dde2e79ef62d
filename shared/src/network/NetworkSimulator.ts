import { decideFate, PERFECT_NETWORK, type NetworkConditions, type PacketFate } from './conditions'
import { addressKey, type Address, type DatagramHandler, type DatagramTransport } from './types'

export interface SimulatedPacket {
  id: number
  source: Address
  destination: Address
  payload: Buffer
}

export interface NetworkEvent {
  packetId: number
  timestamp: number
  source: Address
  destination: Address
  status: 'sent' | 'delivered' | 'dropped'
  latency?: number
}

export interface NetworkStats {
  packetsSent: number
  packetsDelivered: number
  packetsDropped: number
  packetsDuplicated: number
}

/**
 * Decides a packet's fate ahead of the configured conditions.
 * Return undefined to fall back to the random roll.
 */
export type PacketFilter = (packet: SimulatedPacket) => PacketFate | undefined

const FIRST_EPHEMERAL_PORT = 49152

class SimulatedEndpoint implements DatagramTransport {
  private handlers: DatagramHandler[] = []
  private closed = false

  constructor(private network: NetworkSimulator, private local: Address) {}

  async send(payload: Buffer, destination: Address): Promise<void> {
    if (this.closed) {
      throw new Error(`Endpoint ${addressKey(this.local)} is closed`)
    }
    this.network.transmit(this.local, destination, payload)
  }

  onDatagram(handler: DatagramHandler): void {
    this.handlers.push(handler)
  }

  address(): Address {
    return { ...this.local }
  }

  async close(): Promise<void> {
    this.closed = true
    this.network.detach(this.local)
  }

  deliver(payload: Buffer, source: Address): void {
    if (this.closed) return
    for (const handler of this.handlers) {
      try {
        handler(Buffer.from(payload), { ...source })
      } catch (error) {
        console.error(`[NetworkSimulator] Handler at ${addressKey(this.local)} threw:`, error)
      }
    }
  }
}

/**
 * In-process datagram network with configurable loss, duplication and latency.
 * Endpoints created here behave like UDP sockets bound on the simulated network.
 */
export class NetworkSimulator {
  private config: NetworkConditions
  private endpoints: Map<string, SimulatedEndpoint> = new Map()
  private timers: Set<NodeJS.Timeout> = new Set()
  private eventCallbacks: Array<(event: NetworkEvent) => void> = []
  private filter?: PacketFilter
  private nextPacketId = 1
  private nextEphemeralPort = FIRST_EPHEMERAL_PORT
  private stats: NetworkStats = {
    packetsSent: 0,
    packetsDelivered: 0,
    packetsDropped: 0,
    packetsDuplicated: 0
  }

  constructor(config: Partial<NetworkConditions> = {}, private random: () => number = Math.random) {
    this.config = { ...PERFECT_NETWORK, ...config }
  }

  updateConfig(config: Partial<NetworkConditions>) {
    this.config = { ...this.config, ...config }
  }

  getConfig(): NetworkConditions {
    return { ...this.config }
  }

  getStats(): NetworkStats {
    return { ...this.stats }
  }

  setFilter(filter?: PacketFilter) {
    this.filter = filter
  }

  onNetworkEvent(callback: (event: NetworkEvent) => void) {
    this.eventCallbacks.push(callback)
  }

  /**
   * Attach an endpoint. Without a port, the next free ephemeral port is used.
   */
  createEndpoint(address: { host?: string; port?: number } = {}): DatagramTransport {
    const local: Address = {
      host: address.host ?? '127.0.0.1',
      port: address.port ?? this.allocatePort(address.host ?? '127.0.0.1')
    }
    const key = addressKey(local)
    if (this.endpoints.has(key)) {
      throw new Error(`Address ${key} already in use`)
    }

    const endpoint = new SimulatedEndpoint(this, local)
    this.endpoints.set(key, endpoint)
    return endpoint
  }

  transmit(source: Address, destination: Address, payload: Buffer) {
    const packet: SimulatedPacket = {
      id: this.nextPacketId++,
      source: { ...source },
      destination: { ...destination },
      payload: Buffer.from(payload)
    }
    this.stats.packetsSent++
    this.notify(packet, 'sent')

    const fate = this.filter?.(packet) ?? decideFate(this.config, this.random)
    if (fate.kind === 'drop') {
      this.stats.packetsDropped++
      this.notify(packet, 'dropped')
      return
    }

    if (fate.delays.length > 1) {
      this.stats.packetsDuplicated += fate.delays.length - 1
    }
    for (const delay of fate.delays) {
      const timer = setTimeout(() => {
        this.timers.delete(timer)
        this.deliver(packet, delay)
      }, delay)
      this.timers.add(timer)
    }
  }

  detach(address: Address) {
    this.endpoints.delete(addressKey(address))
  }

  /**
   * Cancel every packet still in flight
   */
  shutdown() {
    for (const timer of this.timers) {
      clearTimeout(timer)
    }
    this.timers.clear()
  }

  private deliver(packet: SimulatedPacket, latency: number) {
    const endpoint = this.endpoints.get(addressKey(packet.destination))
    if (!endpoint) {
      // Nobody listening: UDP silently loses it
      this.stats.packetsDropped++
      this.notify(packet, 'dropped')
      return
    }

    this.stats.packetsDelivered++
    this.notify(packet, 'delivered', latency)
    endpoint.deliver(packet.payload, packet.source)
  }

  private allocatePort(host: string): number {
    while (this.endpoints.has(addressKey({ host, port: this.nextEphemeralPort }))) {
      this.nextEphemeralPort++
    }
    return this.nextEphemeralPort++
  }

  private notify(packet: SimulatedPacket, status: NetworkEvent['status'], latency?: number) {
    const event: NetworkEvent = {
      packetId: packet.id,
      timestamp: Date.now(),
      source: packet.source,
      destination: packet.destination,
      status,
      latency
    }
    this.eventCallbacks.forEach(callback => callback(event))
  }
}
