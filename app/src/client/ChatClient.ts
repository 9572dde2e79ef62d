import {
  ChatError,
  CorrelationIds,
  encodedSize,
  MAX_DATAGRAM_SIZE,
  ProtocolError,
  ReliableSender,
  sameAddress,
  type Address,
  type DatagramTransport,
  type MailboxEntry,
  type ReplyMessage,
  type RequestMessage,
  type UserSummary
} from '@dgram-chat/shared'
import type { SessionRecord, SessionStore } from '../session/SessionStore'

export type ClientResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ChatError }

export type ConnectResult = ClientResult<SessionRecord>

export interface ChatClientOptions {
  server: Address
  sessionStore: SessionStore
  maxRetries: number
  timeoutMs: number
  correlationIds?: CorrelationIds
}

function failure<T>(error: ChatError): ClientResult<T> {
  return { ok: false, error }
}

function unexpected<T>(reply: ReplyMessage, expected: ReplyMessage['kind']): ClientResult<T> {
  return failure(new ChatError('UNEXPECTED_REPLY', `Expected ${expected}, server sent ${reply.kind}`))
}

/**
 * Client side of the protocol: one reliable request per operation, with the
 * local identity kept in a SessionRecord so a restarted client can carry on
 * without asking for it again.
 */
export class ChatClient {
  private sender: ReliableSender
  private ids: CorrelationIds
  private session: SessionRecord | null = null
  private shutdownController = new AbortController()
  private pendingSave: Promise<void> | null = null
  private closing: Promise<void> | null = null

  constructor(private transport: DatagramTransport, private options: ChatClientOptions) {
    this.sender = new ReliableSender(transport, 'ChatClient')
    this.ids = options.correlationIds ?? new CorrelationIds()
  }

  get currentSession(): SessionRecord | null {
    return this.session
  }

  /**
   * Load the persisted session, if it belongs to the configured server.
   */
  async resume(): Promise<SessionRecord | null> {
    const record = await this.options.sessionStore.load()
    if (record && !sameAddress(record.server, this.options.server)) {
      console.log(`[ChatClient] Saved session is for ${record.server.host}:${record.server.port}, not resuming`)
      return null
    }
    this.session = record
    return record
  }

  async connect(username: string, firstName: string): Promise<ConnectResult> {
    const result = await this.request({
      kind: 'CONNECT',
      correlationId: this.ids.next(),
      username,
      firstName
    })
    if (!result.ok) return result

    const reply = result.value
    if (reply.kind !== 'CONNECT_ACK') return unexpected(reply, 'CONNECT_ACK')

    const record: SessionRecord = {
      username: reply.username,
      firstName: reply.firstName,
      server: { ...this.options.server },
      savedAt: Date.now()
    }
    this.session = record
    await this.persist(record)
    return { ok: true, value: record }
  }

  async listUsers(): Promise<ClientResult<UserSummary[]>> {
    const result = await this.withSession(session => ({
      kind: 'LIST',
      correlationId: this.ids.next(),
      username: session.username
    }))
    if (!result.ok) return result
    if (result.value.kind !== 'LIST_RESPONSE') return unexpected(result.value, 'LIST_RESPONSE')
    return { ok: true, value: result.value.users }
  }

  async sendMessage(to: string, body: string): Promise<ClientResult<void>> {
    const result = await this.withSession(session => ({
      kind: 'SEND',
      correlationId: this.ids.next(),
      from: session.username,
      to,
      body
    }))
    if (!result.ok) return result
    if (result.value.kind !== 'SEND_ACK') return unexpected(result.value, 'SEND_ACK')
    return { ok: true, value: undefined }
  }

  async retrieveMessages(): Promise<ClientResult<MailboxEntry[]>> {
    const result = await this.withSession(session => ({
      kind: 'RETRIEVE',
      correlationId: this.ids.next(),
      username: session.username
    }))
    if (!result.ok) return result
    if (result.value.kind !== 'RETRIEVE_RESPONSE') return unexpected(result.value, 'RETRIEVE_RESPONSE')
    return { ok: true, value: result.value.messages }
  }

  /**
   * Fire-and-forget notice to the server. The saved session is kept so the
   * next start can reconnect with the same identity.
   */
  async disconnect(): Promise<void> {
    if (!this.session) return
    await this.sender.sendOnce({
      kind: 'DISCONNECT',
      correlationId: this.ids.next(),
      username: this.session.username
    }, this.options.server)
  }

  /**
   * Abort any request in flight, finish a pending session write, say goodbye
   * and release the socket. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (!this.closing) {
      this.closing = this.close()
    }
    return this.closing
  }

  private async close() {
    this.shutdownController.abort()
    if (this.pendingSave) {
      await this.pendingSave
    }
    await this.disconnect()
    await this.transport.close()
  }

  /**
   * Run a request that needs a session. If the server has forgotten us, for
   * example after a restart or idle eviction, reconnect once with the saved
   * identity and replay the request under a fresh correlation id.
   */
  private async withSession(build: (session: SessionRecord) => RequestMessage): Promise<ClientResult<ReplyMessage>> {
    const session = this.session
    if (!session) {
      return failure(new ChatError('NO_SESSION', 'Not connected: connect with a username first'))
    }

    const first = await this.request(build(session))
    if (first.ok || first.error.code !== 'NOT_CONNECTED') return first

    console.log(`[ChatClient] Server does not recognise ${session.username}, reconnecting`)
    const reconnected = await this.connect(session.username, session.firstName)
    if (!reconnected.ok) {
      if (reconnected.error.code === 'USERNAME_TAKEN') {
        await this.invalidateSession()
      }
      return reconnected
    }
    return this.request(build(reconnected.value))
  }

  private async request(message: RequestMessage): Promise<ClientResult<ReplyMessage>> {
    if (this.shutdownController.signal.aborted) {
      return failure(new ChatError('CANCELLED', 'Client is shutting down'))
    }
    if (encodedSize(message) > MAX_DATAGRAM_SIZE) {
      return failure(new ChatError('MESSAGE_TOO_LARGE', `${message.kind} does not fit in a single datagram`))
    }

    const result = await this.sender.sendReliable(message, this.options.server, {
      maxRetries: this.options.maxRetries,
      timeoutMs: this.options.timeoutMs,
      signal: this.shutdownController.signal
    })

    switch (result.status) {
      case 'cancelled':
        return failure(new ChatError('CANCELLED', `${message.kind} cancelled by shutdown`))
      case 'failed':
        return failure(result.error)
      case 'delivered':
        if (result.reply.kind === 'ERROR') {
          return failure(new ProtocolError(result.reply.code, result.reply.message))
        }
        return { ok: true, value: result.reply }
    }
  }

  private persist(record: SessionRecord): Promise<void> {
    const save = this.options.sessionStore.save(record)
      .catch((error: unknown) => {
        console.warn('[ChatClient] Could not save session:', error)
      })
      .finally(() => {
        if (this.pendingSave === save) this.pendingSave = null
      })
    this.pendingSave = save
    return save
  }

  private async invalidateSession() {
    console.warn(`[ChatClient] Saved identity ${this.session?.username ?? ''} is held by someone else, forgetting it`)
    this.session = null
    try {
      await this.options.sessionStore.clear()
    } catch (error) {
      console.warn('[ChatClient] Could not remove saved session:', error)
    }
  }
}
