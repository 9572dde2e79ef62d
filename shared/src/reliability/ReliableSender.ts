import { DeliveryFailedError } from '../errors'
import { decode, encode } from '../protocol/codec'
import { isReply, type ProtocolMessage, type ReplyMessage, type RequestMessage } from '../protocol/messages'
import { addressKey, sameAddress, type Address, type DatagramTransport } from '../network/types'

export interface ReliableSendOptions {
  /** Retransmissions allowed after the first send */
  maxRetries: number
  /** Wait per attempt before retransmitting */
  timeoutMs: number
  signal?: AbortSignal
}

export type AckResult =
  | { status: 'delivered'; reply: ReplyMessage; attempts: number }
  | { status: 'failed'; error: DeliveryFailedError; attempts: number }
  | { status: 'cancelled'; attempts: number }

interface PendingRequest {
  correlationId: number
  kind: RequestMessage['kind']
  payload: Buffer
  destination: Address
  sentAt: number
  retries: number
  timer?: NodeJS.Timeout
  settle: (result: AckResult) => void
}

/**
 * Retry-until-acknowledged sends over an unreliable DatagramTransport.
 *
 * Each request keeps its correlation id across retransmissions, so the
 * receiver can recognise a replay. A reply only counts when both the
 * correlation id and the source address match the pending request.
 */
export class ReliableSender {
  private pending: Map<number, PendingRequest> = new Map()

  constructor(private transport: DatagramTransport, private label: string = 'ReliableSender') {
    this.transport.onDatagram((payload, source) => this.receive(payload, source))
  }

  sendReliable(message: RequestMessage, destination: Address, options: ReliableSendOptions): Promise<AckResult> {
    const { maxRetries, timeoutMs, signal } = options
    const { correlationId } = message

    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${maxRetries}`)
    }
    if (!(timeoutMs > 0)) {
      throw new RangeError(`timeoutMs must be positive, got ${timeoutMs}`)
    }
    if (this.pending.has(correlationId)) {
      throw new Error(`Correlation id ${correlationId} is already awaiting a reply`)
    }

    const payload = encode(message)
    if (signal?.aborted) {
      return Promise.resolve({ status: 'cancelled', attempts: 0 })
    }

    return new Promise<AckResult>((resolve) => {
      const onAbort = () => {
        request.settle({ status: 'cancelled', attempts: request.retries + 1 })
      }

      const request: PendingRequest = {
        correlationId,
        kind: message.kind,
        payload,
        destination: { ...destination },
        sentAt: 0,
        retries: 0,
        settle: (result) => {
          if (this.pending.get(correlationId) !== request) return
          this.pending.delete(correlationId)
          clearTimeout(request.timer)
          signal?.removeEventListener('abort', onAbort)
          resolve(result)
        }
      }

      const onTimeout = () => {
        if (this.pending.get(correlationId) !== request) return

        const attempts = request.retries + 1
        if (request.retries >= maxRetries) {
          console.warn(`[${this.label}] ${request.kind} #${correlationId} undelivered after ${attempts} attempts`)
          request.settle({ status: 'failed', error: new DeliveryFailedError(attempts), attempts })
          return
        }

        request.retries++
        console.warn(`[${this.label}] ${request.kind} #${correlationId} timed out after ${timeoutMs}ms, retry ${request.retries}/${maxRetries}`)
        transmit()
      }

      const transmit = () => {
        request.sentAt = Date.now()
        this.transport.send(payload, request.destination).catch((error) => {
          // Counts as a lost packet; the timer below drives the retry
          console.error(`[${this.label}] Failed to transmit ${request.kind} #${correlationId} to ${addressKey(request.destination)}:`, error)
        })
        request.timer = setTimeout(onTimeout, timeoutMs)
      }

      this.pending.set(correlationId, request)
      signal?.addEventListener('abort', onAbort, { once: true })
      transmit()
    })
  }

  /**
   * Best-effort single transmission with no acknowledgment tracking.
   * Never rejects.
   */
  async sendOnce(message: ProtocolMessage, destination: Address): Promise<void> {
    try {
      await this.transport.send(encode(message), destination)
    } catch (error) {
      console.error(`[${this.label}] Failed to send ${message.kind} #${message.correlationId}:`, error)
    }
  }

  /**
   * Match an inbound message against the outstanding requests.
   * Returns true when it settled one of them.
   */
  handleDatagram(message: ProtocolMessage, source: Address): boolean {
    if (!isReply(message)) return false

    const request = this.pending.get(message.correlationId)
    if (!request) {
      // Late reply for a request that already settled
      return false
    }
    if (!sameAddress(source, request.destination)) {
      console.warn(`[${this.label}] Ignoring ${message.kind} #${message.correlationId} from unexpected ${addressKey(source)}`)
      return false
    }

    request.settle({ status: 'delivered', reply: message, attempts: request.retries + 1 })
    return true
  }

  pendingCount(): number {
    return this.pending.size
  }

  /**
   * Cancel every outstanding request
   */
  cancelAll() {
    for (const request of [...this.pending.values()]) {
      request.settle({ status: 'cancelled', attempts: request.retries + 1 })
    }
  }

  private receive(payload: Buffer, source: Address) {
    const result = decode(payload)
    if (!result.ok) {
      console.warn(`[${this.label}] Discarding packet from ${addressKey(source)}: ${result.error.message}`)
      return
    }
    this.handleDatagram(result.message, source)
  }
}
