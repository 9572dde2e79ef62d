export interface Address {
  host: string
  port: number
}

export type DatagramHandler = (payload: Buffer, source: Address) => void

/**
 * Connectionless, unordered, lossy datagram primitive.
 * Implemented over real UDP by UDPTransport and in memory by NetworkSimulator.
 */
export interface DatagramTransport {
  /**
   * Hand one datagram to the network. Resolves once it has left this endpoint,
   * which says nothing about whether it will arrive.
   */
  send(payload: Buffer, destination: Address): Promise<void>

  /**
   * Register a handler for every inbound datagram.
   */
  onDatagram(handler: DatagramHandler): void

  /**
   * Local address this endpoint receives on
   */
  address(): Address

  close(): Promise<void>
}

export function addressKey(address: Address): string {
  return `${address.host}:${address.port}`
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.host === b.host && a.port === b.port
}
