import { addressKey, type Address, type ReplyMessage } from '@dgram-chat/shared'

/**
 * Remembers the reply computed for the last `windowSize` correlation ids of
 * each source address, so a retransmitted request gets the same answer
 * without being applied twice.
 */
export class DedupCache {
  private windows: Map<string, Map<number, ReplyMessage>> = new Map()

  constructor(private windowSize: number = 32, private maxAddresses: number = 4096) {}

  lookup(source: Address, correlationId: number): ReplyMessage | undefined {
    return this.windows.get(addressKey(source))?.get(correlationId)
  }

  remember(source: Address, correlationId: number, reply: ReplyMessage) {
    const key = addressKey(source)
    const window = this.windows.get(key) ?? new Map<number, ReplyMessage>()

    // Re-insert so the most recently active address is last
    this.windows.delete(key)
    this.windows.set(key, window)

    window.set(correlationId, reply)
    while (window.size > this.windowSize) {
      const oldest = window.keys().next()
      if (oldest.done) break
      window.delete(oldest.value)
    }

    while (this.windows.size > this.maxAddresses) {
      const stalest = this.windows.keys().next()
      if (stalest.done) break
      this.windows.delete(stalest.value)
    }
  }

  size(): number {
    let total = 0
    for (const window of this.windows.values()) {
      total += window.size
    }
    return total
  }
}
