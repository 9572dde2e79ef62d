import { createSocket, type Socket } from 'dgram'
import type { Address, DatagramHandler, DatagramTransport } from './types'

/**
 * DatagramTransport over a real udp4 socket.
 * Bind to port 0 for an ephemeral client address.
 */
export class UDPTransport implements DatagramTransport {
  private socket: Socket
  private handlers: DatagramHandler[] = []
  private bound = false
  private closed = false

  constructor(private label: string = 'UDPTransport') {
    this.socket = createSocket('udp4')
    this.setupSocket()
  }

  bind(port: number = 0, host?: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => reject(error)
      this.socket.once('error', onError)
      this.socket.bind(port, host, () => {
        this.socket.off('error', onError)
        this.bound = true
        const local = this.address()
        console.log(`[${this.label}] Listening on UDP ${local.host}:${local.port}`)
        resolve()
      })
    })
  }

  send(payload: Buffer, destination: Address): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(payload, destination.port, destination.host, (err) => {
        if (err) {
          reject(err)
        } else {
          resolve()
        }
      })
    })
  }

  onDatagram(handler: DatagramHandler): void {
    this.handlers.push(handler)
  }

  address(): Address {
    if (!this.bound) {
      throw new Error(`[${this.label}] Socket is not bound`)
    }
    const info = this.socket.address()
    return { host: info.address, port: info.port }
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve()
    this.closed = true
    return new Promise((resolve) => {
      this.socket.close(() => {
        console.log(`[${this.label}] Closed`)
        resolve()
      })
    })
  }

  private setupSocket() {
    this.socket.on('message', (msg, rinfo) => {
      const source: Address = { host: rinfo.address, port: rinfo.port }
      for (const handler of this.handlers) {
        try {
          handler(msg, source)
        } catch (error) {
          console.error(`[${this.label}] Error handling datagram from ${rinfo.address}:${rinfo.port}:`, error)
        }
      }
    })

    this.socket.on('error', (err) => {
      console.error(`[${this.label}] Socket error:`, err)
    })
  }
}
