import {
  addressKey,
  decode,
  encode,
  type Address,
  type DatagramTransport,
  type ReplyMessage
} from '@dgram-chat/shared'
import { Directory } from '../directory/Directory'
import { MailboxStore } from '../directory/MailboxStore'
import type { MailboxFile } from '../storage/MailboxFile'
import { DedupCache } from './DedupCache'
import { RequestHandler } from './RequestHandler'

export interface ChatServerOptions {
  dedupWindow: number
  maxMailboxSize: number
  /** Idle time after which a user is evicted; 0 keeps users until they disconnect */
  userTtlMs: number
  evictionIntervalMs: number
  /** Where undelivered messages are kept across restarts; null keeps them in memory only */
  mailboxFile: MailboxFile | null
}

export interface ServerStats {
  uptimeMs: number
  packetsReceived: number
  malformedPackets: number
  ignoredPackets: number
  duplicateRequests: number
  repliesSent: number
  replyFailures: number
  evictedUsers: number
  persistFailures: number
  users: number
  mailboxDepths: Record<string, number>
}

function changesMailboxes(reply: ReplyMessage): boolean {
  return reply.kind === 'SEND_ACK' || (reply.kind === 'RETRIEVE_RESPONSE' && reply.messages.length > 0)
}

const DEFAULT_OPTIONS: ChatServerOptions = {
  dedupWindow: 32,
  maxMailboxSize: 1000,
  userTtlMs: 30 * 60 * 1000,
  evictionIntervalMs: 60 * 1000,
  mailboxFile: null
}

/**
 * Directory server loop: one datagram in, at most one reply out, handled to
 * completion before the next datagram is looked at.
 */
export class ChatServer {
  readonly directory: Directory
  readonly mailboxes: MailboxStore
  private handler: RequestHandler
  private options: ChatServerOptions
  private evictionTimer: NodeJS.Timeout | null = null
  private started = false
  private saving: Promise<void> | null = null
  private saveQueued = false
  private startedAt = Date.now()
  private counters = {
    packetsReceived: 0,
    malformedPackets: 0,
    ignoredPackets: 0,
    duplicateRequests: 0,
    repliesSent: 0,
    replyFailures: 0,
    evictedUsers: 0,
    persistFailures: 0
  }

  constructor(private transport: DatagramTransport, options: Partial<ChatServerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options }
    this.directory = new Directory()
    this.mailboxes = new MailboxStore(this.options.maxMailboxSize)
    this.handler = new RequestHandler(this.directory, this.mailboxes, new DedupCache(this.options.dedupWindow))
  }

  start() {
    if (this.started) return
    this.started = true
    this.startedAt = Date.now()

    this.transport.onDatagram((payload, source) => this.handleDatagram(payload, source))

    if (this.options.userTtlMs > 0) {
      this.evictionTimer = setInterval(() => this.evictIdleUsers(), this.options.evictionIntervalMs)
      this.evictionTimer.unref()
    }

    const local = this.transport.address()
    console.log(`[ChatServer] Ready on ${local.host}:${local.port}`)
  }

  async stop() {
    if (this.evictionTimer) {
      clearInterval(this.evictionTimer)
      this.evictionTimer = null
    }
    await this.transport.close()
    await this.flush()
    console.log('[ChatServer] Stopped')
  }

  /**
   * Load mailboxes saved by an earlier run. Call before start().
   * Returns the number of messages restored.
   */
  async restoreMailboxes(): Promise<number> {
    const file = this.options.mailboxFile
    if (!file) return 0

    const saved = await file.load()
    if (!saved) return 0

    const restored = this.mailboxes.restore(saved)
    console.log(`[ChatServer] Restored ${restored} queued message(s) from ${file.filePath}`)
    return restored
  }

  /**
   * Resolves once every pending mailbox write has finished.
   */
  async flush(): Promise<void> {
    while (this.saving) {
      await this.saving
    }
  }

  /**
   * Remove users idle past the configured TTL. Their mailboxes are kept.
   */
  evictIdleUsers(now: number = Date.now()): string[] {
    if (this.options.userTtlMs <= 0) return []

    const evicted = this.directory.evictIdle(now, this.options.userTtlMs)
    if (evicted.length > 0) {
      this.counters.evictedUsers += evicted.length
      console.log(`[ChatServer] Evicted idle users: ${evicted.join(', ')}`)
    }
    return evicted
  }

  getStats(): ServerStats {
    return {
      uptimeMs: Date.now() - this.startedAt,
      ...this.counters,
      users: this.directory.size(),
      mailboxDepths: this.mailboxes.depths()
    }
  }

  private handleDatagram(payload: Buffer, source: Address) {
    this.counters.packetsReceived++

    const decoded = decode(payload)
    if (!decoded.ok) {
      this.counters.malformedPackets++
      console.warn(`[ChatServer] Discarding packet from ${addressKey(source)}: ${decoded.error.message}`)
      return
    }

    const handled = this.handler.handle(decoded.message, source)
    if (!handled) {
      this.counters.ignoredPackets++
      return
    }
    if (handled.duplicate) {
      this.counters.duplicateRequests++
    } else if (changesMailboxes(handled.reply)) {
      this.persistMailboxes()
    }

    this.reply(handled.reply, source)
  }

  /**
   * Writes are serialized; changes made while one is in flight are picked up
   * by a single follow-up write.
   */
  private persistMailboxes() {
    const file = this.options.mailboxFile
    if (!file) return
    if (this.saving) {
      this.saveQueued = true
      return
    }
    this.saving = this.writeSnapshots(file)
  }

  private async writeSnapshots(file: MailboxFile): Promise<void> {
    try {
      do {
        this.saveQueued = false
        try {
          await file.save(this.mailboxes.snapshot())
        } catch (error) {
          this.counters.persistFailures++
          console.error(`[ChatServer] Could not save mailboxes to ${file.filePath}:`, error)
        }
      } while (this.saveQueued)
    } finally {
      this.saving = null
    }
  }

  private reply(message: ReplyMessage, destination: Address) {
    let payload: Buffer
    try {
      payload = encode(message)
    } catch (error) {
      this.counters.replyFailures++
      console.error(`[ChatServer] Could not encode ${message.kind} #${message.correlationId}:`, error)
      return
    }

    this.transport.send(payload, destination).then(
      () => {
        this.counters.repliesSent++
      },
      (error: unknown) => {
        this.counters.replyFailures++
        console.error(`[ChatServer] Failed to reply ${message.kind} #${message.correlationId} to ${addressKey(destination)}:`, error)
      }
    )
  }
}
