import {
  addressKey,
  encodedSize,
  isRequest,
  MAX_DATAGRAM_SIZE,
  type Address,
  type ErrorMessage,
  type MailboxEntry,
  type ProtocolErrorCode,
  type ProtocolMessage,
  type ReplyMessage,
  type RequestMessage,
  type UserSummary
} from '@dgram-chat/shared'
import type { Directory } from '../directory/Directory'
import type { MailboxStore } from '../directory/MailboxStore'
import type { DedupCache } from './DedupCache'

export const MAX_USERNAME_LENGTH = 32

export interface HandledRequest {
  reply: ReplyMessage
  duplicate: boolean
}

function errorReply(correlationId: number, code: ProtocolErrorCode, message: string): ErrorMessage {
  return { kind: 'ERROR', correlationId, code, message }
}

function validateUsername(username: string): string | undefined {
  if (username.length === 0) return 'Username cannot be empty'
  if (/\s/.test(username)) return 'Username cannot contain whitespace'
  if (username.length > MAX_USERNAME_LENGTH) return `Username is longer than ${MAX_USERNAME_LENGTH} characters`
  return undefined
}

function fieldsSize(fields: string[]): number {
  return fields.reduce((size, field) => size + 2 + Buffer.byteLength(field, 'utf8'), 0)
}

/**
 * Length of the longest prefix of `items` that still fits in one datagram
 * after `emptySize` bytes of header. Stops at the first item that overflows.
 */
function fitInDatagram<T>(items: readonly T[], emptySize: number, fieldsOf: (item: T) => string[]): number {
  let size = emptySize
  let count = 0
  for (const item of items) {
    size += fieldsSize(fieldsOf(item))
    if (size > MAX_DATAGRAM_SIZE) break
    count++
  }
  return count
}

const userFields = (user: UserSummary) => [user.username, user.firstName]
const entryFields = (entry: MailboxEntry) => [entry.from, entry.body, String(entry.sentAt)]

/**
 * Server side of the protocol. Each request is received, validated,
 * applied to the directory and mailboxes, and answered with exactly one reply.
 * Retransmitted requests are answered from the dedup cache instead of being
 * applied again.
 */
export class RequestHandler {
  constructor(
    private directory: Directory,
    private mailboxes: MailboxStore,
    private dedup: DedupCache
  ) {}

  /**
   * Returns null only for messages that are not requests (stray replies),
   * which have no one to answer.
   */
  handle(message: ProtocolMessage, source: Address, now: number = Date.now()): HandledRequest | null {
    if (!isRequest(message)) {
      console.warn(`[RequestHandler] Ignoring ${message.kind} #${message.correlationId} from ${addressKey(source)}: not a request`)
      return null
    }

    const cached = this.dedup.lookup(source, message.correlationId)
    if (cached) {
      console.log(`[RequestHandler] Duplicate ${message.kind} #${message.correlationId} from ${addressKey(source)}, re-sending ${cached.kind}`)
      return { reply: cached, duplicate: true }
    }

    const reply = this.apply(message, source, now)
    this.dedup.remember(source, message.correlationId, reply)
    return { reply, duplicate: false }
  }

  private apply(message: RequestMessage, source: Address, now: number): ReplyMessage {
    switch (message.kind) {
      case 'CONNECT':
        return this.connect(message.correlationId, message.username, message.firstName, source, now)
      case 'LIST':
        return this.list(message.correlationId, message.username, source, now)
      case 'SEND':
        return this.send(message.correlationId, message.from, message.to, message.body, source, now)
      case 'RETRIEVE':
        return this.retrieve(message.correlationId, message.username, source, now)
      case 'DISCONNECT':
        return this.disconnect(message.correlationId, message.username, source)
      default: {
        const unreachable: never = message
        throw new Error(`Unhandled request: ${JSON.stringify(unreachable)}`)
      }
    }
  }

  private connect(correlationId: number, username: string, firstName: string, source: Address, now: number): ReplyMessage {
    const problem = validateUsername(username)
    if (problem) {
      return errorReply(correlationId, 'BAD_REQUEST', problem)
    }
    if (firstName.trim().length === 0) {
      return errorReply(correlationId, 'BAD_REQUEST', 'First name cannot be empty')
    }

    const outcome = this.directory.connect(username, firstName, source, now)
    if (!outcome.ok) {
      console.warn(`[RequestHandler] ${username} is taken by ${addressKey(outcome.holder)}, refused ${addressKey(source)}`)
      return errorReply(correlationId, 'USERNAME_TAKEN', `Username "${username}" is already in use`)
    }

    console.log(`[RequestHandler] ${username} ${outcome.created ? 'connected' : 'reconnected'} from ${addressKey(source)}`)
    return { kind: 'CONNECT_ACK', correlationId, username, firstName }
  }

  private list(correlationId: number, username: string, source: Address, now: number): ReplyMessage {
    const refusal = this.requireSession(correlationId, username, source, now)
    if (refusal) return refusal

    const users = this.directory.summaries()
    const count = fitInDatagram(users, encodedSize({ kind: 'LIST_RESPONSE', correlationId, users: [] }), userFields)
    return { kind: 'LIST_RESPONSE', correlationId, users: users.slice(0, count) }
  }

  private send(correlationId: number, from: string, to: string, body: string, source: Address, now: number): ReplyMessage {
    const refusal = this.requireSession(correlationId, from, source, now)
    if (refusal) return refusal

    if (body.length === 0) {
      return errorReply(correlationId, 'BAD_REQUEST', 'Message body cannot be empty')
    }
    if (!this.directory.lookup(to)) {
      return errorReply(correlationId, 'UNKNOWN_RECIPIENT', `No such user "${to}"`)
    }
    const entry: MailboxEntry = { from, body, sentAt: now }
    if (fitInDatagram([entry], encodedSize({ kind: 'RETRIEVE_RESPONSE', correlationId, messages: [] }), entryFields) === 0) {
      return errorReply(correlationId, 'BAD_REQUEST', 'Message body is too large to deliver')
    }
    if (!this.mailboxes.enqueue(to, entry)) {
      return errorReply(correlationId, 'MAILBOX_FULL', `Mailbox of "${to}" is full`)
    }

    console.log(`[RequestHandler] Queued message from ${from} to ${to}`)
    return { kind: 'SEND_ACK', correlationId }
  }

  private retrieve(correlationId: number, username: string, source: Address, now: number): ReplyMessage {
    const refusal = this.requireSession(correlationId, username, source, now)
    if (refusal) return refusal

    const emptySize = encodedSize({ kind: 'RETRIEVE_RESPONSE', correlationId, messages: [] })
    const count = fitInDatagram(this.mailboxes.peek(username), emptySize, entryFields)
    return { kind: 'RETRIEVE_RESPONSE', correlationId, messages: this.mailboxes.drain(username, count) }
  }

  private disconnect(correlationId: number, username: string, source: Address): ReplyMessage {
    if (this.directory.disconnect(username, source)) {
      console.log(`[RequestHandler] ${username} disconnected from ${addressKey(source)}`)
    }
    return { kind: 'ACK', correlationId }
  }

  private requireSession(correlationId: number, username: string, source: Address, now: number): ErrorMessage | undefined {
    if (!this.directory.isConnectedFrom(username, source)) {
      return errorReply(correlationId, 'NOT_CONNECTED', `"${username}" is not connected from this address`)
    }
    this.directory.touch(username, now)
    return undefined
  }
}
