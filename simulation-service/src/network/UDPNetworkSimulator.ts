import { createSocket, type Socket } from 'dgram'
import {
  addressKey,
  decideFate,
  PERFECT_NETWORK,
  type Address,
  type NetworkConditions
} from '@dgram-chat/shared'

/**
 * Lossy UDP proxy:
 *
 *   client ──► [proxy port] ──► upstream socket per client ──► chat server
 *   client ◄── [proxy port] ◄── upstream socket per client ◄── chat server
 *
 * Every datagram, in either direction, is dropped, delayed or duplicated
 * according to the current NetworkConditions. One upstream socket per client
 * keeps client addresses distinct from the server's point of view. Routes
 * idle for longer than `routeIdleMs` are closed.
 */

interface ClientRoute {
  client: Address
  upstream: Socket
  lastSeen: number
}

export interface ProxyStats {
  packetsReceived: number
  packetsForwarded: number
  packetsDropped: number
  packetsDuplicated: number
  clients: Array<{ address: string; lastSeen: number }>
  config: NetworkConditions
}

export class UDPNetworkSimulator {
  private socket: Socket
  private routes: Map<string, ClientRoute> = new Map()
  private timers: Set<NodeJS.Timeout> = new Set()
  private pruneTimer: NodeJS.Timeout | null = null
  private config: NetworkConditions
  private stopped = false
  private stats = {
    packetsReceived: 0,
    packetsForwarded: 0,
    packetsDropped: 0,
    packetsDuplicated: 0
  }

  constructor(
    private port: number,
    private upstream: Address,
    config: Partial<NetworkConditions> = {},
    private random: () => number = Math.random,
    /** 0 keeps routes until stop() */
    private routeIdleMs: number = 5 * 60 * 1000
  ) {
    this.config = { ...PERFECT_NETWORK, ...config }
    this.socket = createSocket('udp4')
    this.setupSocket()
  }

  /**
   * Start listening for clients
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => reject(error)
      this.socket.once('error', onError)
      this.socket.bind(this.port, () => {
        this.socket.off('error', onError)
        if (this.routeIdleMs > 0) {
          this.pruneTimer = setInterval(() => this.pruneIdleRoutes(), Math.min(this.routeIdleMs, 60 * 1000))
          this.pruneTimer.unref()
        }
        console.log(`[UDPNetworkSimulator] Listening on UDP port ${this.address().port}, forwarding to ${addressKey(this.upstream)}`)
        resolve()
      })
    })
  }

  /**
   * Stop forwarding and close every socket
   */
  async stop(): Promise<void> {
    if (this.stopped) return
    this.stopped = true

    if (this.pruneTimer) {
      clearInterval(this.pruneTimer)
      this.pruneTimer = null
    }
    for (const timer of this.timers) {
      clearTimeout(timer)
    }
    this.timers.clear()

    const sockets = [this.socket, ...Array.from(this.routes.values(), route => route.upstream)]
    this.routes.clear()
    await Promise.all(sockets.map(socket => new Promise<void>(resolve => socket.close(() => resolve()))))
    console.log('[UDPNetworkSimulator] Stopped')
  }

  /**
   * Bound address of the public socket. Only valid after start().
   */
  address(): Address {
    const bound = this.socket.address()
    return { host: bound.address, port: bound.port }
  }

  /**
   * Close the upstream socket of every client silent since before
   * `now - routeIdleMs`. Returns the pruned client addresses.
   */
  pruneIdleRoutes(now: number = Date.now()): string[] {
    if (this.routeIdleMs <= 0) return []

    const pruned: string[] = []
    for (const [key, route] of this.routes) {
      if (now - route.lastSeen <= this.routeIdleMs) continue
      this.routes.delete(key)
      route.upstream.close()
      pruned.push(key)
    }
    if (pruned.length > 0) {
      console.log(`[UDPNetworkSimulator] Closed idle routes: ${pruned.join(', ')}`)
    }
    return pruned
  }

  updateConfig(config: Partial<NetworkConditions>) {
    this.config = { ...this.config, ...config }
    console.log('[UDPNetworkSimulator] Updated network config:', this.config)
  }

  getConfig(): NetworkConditions {
    return { ...this.config }
  }

  getStats(): ProxyStats {
    return {
      ...this.stats,
      clients: Array.from(this.routes.values(), route => ({
        address: addressKey(route.client),
        lastSeen: route.lastSeen
      })),
      config: this.getConfig()
    }
  }

  private setupSocket() {
    this.socket.on('message', (msg, rinfo) => {
      const route = this.routeFor({ host: rinfo.address, port: rinfo.port })
      this.forward(msg, route.upstream, this.upstream)
    })

    this.socket.on('error', (err) => {
      console.error('[UDPNetworkSimulator] Socket error:', err)
    })
  }

  private routeFor(client: Address): ClientRoute {
    const key = addressKey(client)
    const existing = this.routes.get(key)
    if (existing) {
      existing.lastSeen = Date.now()
      return existing
    }

    const upstream = createSocket('udp4')
    const route: ClientRoute = { client, upstream, lastSeen: Date.now() }

    // Replies from the server travel back through the proxy's public socket
    upstream.on('message', (msg) => {
      this.forward(msg, this.socket, route.client)
    })
    upstream.on('error', (err) => {
      console.error(`[UDPNetworkSimulator] Upstream socket for ${key} failed:`, err)
    })

    this.routes.set(key, route)
    console.log(`[UDPNetworkSimulator] New client ${key}`)
    return route
  }

  private forward(data: Buffer, via: Socket, destination: Address) {
    this.stats.packetsReceived++

    const fate = decideFate(this.config, this.random)
    if (fate.kind === 'drop') {
      this.stats.packetsDropped++
      console.log(`[UDPNetworkSimulator] Dropped packet to ${addressKey(destination)} (simulated loss)`)
      return
    }

    if (fate.delays.length > 1) {
      this.stats.packetsDuplicated += fate.delays.length - 1
    }

    for (const delay of fate.delays) {
      const timer = setTimeout(() => {
        this.timers.delete(timer)
        const onSent = (err: Error | null) => {
          if (err) {
            console.error(`[UDPNetworkSimulator] Error sending to ${addressKey(destination)}:`, err)
            this.stats.packetsDropped++
          } else {
            this.stats.packetsForwarded++
          }
        }
        try {
          via.send(data, destination.port, destination.host, onSent)
        } catch (error) {
          // The route was pruned while the packet was delayed
          onSent(error instanceof Error ? error : new Error(String(error)))
        }
      }, delay)
      this.timers.add(timer)
    }
  }
}
