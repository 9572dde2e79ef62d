import { MalformedPacketError } from '../errors'
import {
  isErrorCode,
  REPLY_KINDS,
  REQUEST_KINDS,
  type MailboxEntry,
  type MessageKind,
  type ProtocolMessage,
  type UserSummary
} from './messages'

/**
 * Binary datagram layout:
 *
 *   [version:u8][kind:u8][correlationId:u32be][fieldCount:u16be]
 *   then fieldCount × [length:u16be][utf-8 bytes]
 *
 * List replies flatten their items into consecutive fields.
 */

export const PROTOCOL_VERSION = 1
export const HEADER_SIZE = 8
export const MAX_FIELD_SIZE = 0xffff
export const MAX_DATAGRAM_SIZE = 65507
export const MAX_CORRELATION_ID = 0xffffffff

const KIND_TAGS: Record<MessageKind, number> = {
  CONNECT: 1,
  CONNECT_ACK: 2,
  LIST: 3,
  LIST_RESPONSE: 4,
  SEND: 5,
  SEND_ACK: 6,
  RETRIEVE: 7,
  RETRIEVE_RESPONSE: 8,
  ACK: 9,
  ERROR: 10,
  DISCONNECT: 11
}

const TAG_KINDS = new Map<number, MessageKind>()
for (const kind of [...REQUEST_KINDS, ...REPLY_KINDS]) {
  TAG_KINDS.set(KIND_TAGS[kind], kind)
}

export type DecodeResult =
  | { ok: true; message: ProtocolMessage }
  | { ok: false; error: MalformedPacketError }

// ignoreBOM keeps a leading U+FEFF as field content instead of stripping it
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

function fieldsOf(message: ProtocolMessage): string[] {
  switch (message.kind) {
    case 'CONNECT':
    case 'CONNECT_ACK':
      return [message.username, message.firstName]
    case 'LIST':
    case 'RETRIEVE':
    case 'DISCONNECT':
      return [message.username]
    case 'LIST_RESPONSE':
      return message.users.flatMap(user => [user.username, user.firstName])
    case 'SEND':
      return [message.from, message.to, message.body]
    case 'SEND_ACK':
    case 'ACK':
      return []
    case 'RETRIEVE_RESPONSE':
      return message.messages.flatMap(entry => [entry.from, entry.body, String(entry.sentAt)])
    case 'ERROR':
      return [message.code, message.message]
    default: {
      const unreachable: never = message
      throw new Error(`Unhandled message kind: ${JSON.stringify(unreachable)}`)
    }
  }
}

/**
 * Serialize a message into a single datagram payload.
 * Throws RangeError when a field or the whole datagram is too large to send.
 */
export function encode(message: ProtocolMessage): Buffer {
  const { correlationId } = message
  if (!Number.isInteger(correlationId) || correlationId < 0 || correlationId > MAX_CORRELATION_ID) {
    throw new RangeError(`Correlation id out of range: ${correlationId}`)
  }

  const fields = fieldsOf(message).map(field => Buffer.from(field, 'utf8'))
  if (fields.length > 0xffff) {
    throw new RangeError(`Too many fields: ${fields.length}`)
  }

  let size = HEADER_SIZE
  for (const field of fields) {
    if (field.length > MAX_FIELD_SIZE) {
      throw new RangeError(`Field of ${field.length} bytes exceeds ${MAX_FIELD_SIZE}`)
    }
    size += 2 + field.length
  }
  if (size > MAX_DATAGRAM_SIZE) {
    throw new RangeError(`Datagram of ${size} bytes exceeds ${MAX_DATAGRAM_SIZE}`)
  }

  const packet = Buffer.alloc(size)
  packet.writeUInt8(PROTOCOL_VERSION, 0)
  packet.writeUInt8(KIND_TAGS[message.kind], 1)
  packet.writeUInt32BE(correlationId, 2)
  packet.writeUInt16BE(fields.length, 6)

  let offset = HEADER_SIZE
  for (const field of fields) {
    packet.writeUInt16BE(field.length, offset)
    offset += 2
    field.copy(packet, offset)
    offset += field.length
  }

  return packet
}

/**
 * Size in bytes that `encode` would produce, without building the packet.
 */
export function encodedSize(message: ProtocolMessage): number {
  return fieldsOf(message).reduce((size, field) => size + 2 + Buffer.byteLength(field, 'utf8'), HEADER_SIZE)
}

function malformed(reason: string): DecodeResult {
  return { ok: false, error: new MalformedPacketError(reason) }
}

function readFields(payload: Buffer, count: number): string[] | string {
  const fields: string[] = []
  let offset = HEADER_SIZE

  for (let i = 0; i < count; i++) {
    if (offset + 2 > payload.length) {
      return `truncated length prefix of field ${i}`
    }
    const length = payload.readUInt16BE(offset)
    offset += 2
    if (offset + length > payload.length) {
      return `truncated field ${i}`
    }
    try {
      fields.push(utf8.decode(payload.subarray(offset, offset + length)))
    } catch {
      return `field ${i} is not valid utf-8`
    }
    offset += length
  }

  if (offset !== payload.length) {
    return `${payload.length - offset} trailing bytes`
  }
  return fields
}

function parseTimestamp(value: string): number | undefined {
  if (!/^(0|[1-9][0-9]*)$/.test(value)) return undefined
  const parsed = Number(value)
  return Number.isSafeInteger(parsed) ? parsed : undefined
}

function expectCount(kind: MessageKind, fields: string[], expected: number): string | undefined {
  return fields.length === expected
    ? undefined
    : `${kind} expects ${expected} fields, got ${fields.length}`
}

function build(kind: MessageKind, correlationId: number, fields: string[]): DecodeResult {
  let problem: string | undefined

  switch (kind) {
    case 'CONNECT':
    case 'CONNECT_ACK':
      problem = expectCount(kind, fields, 2)
      if (problem) return malformed(problem)
      return { ok: true, message: { kind, correlationId, username: fields[0], firstName: fields[1] } }

    case 'LIST':
    case 'RETRIEVE':
    case 'DISCONNECT':
      problem = expectCount(kind, fields, 1)
      if (problem) return malformed(problem)
      return { ok: true, message: { kind, correlationId, username: fields[0] } }

    case 'SEND':
      problem = expectCount(kind, fields, 3)
      if (problem) return malformed(problem)
      return { ok: true, message: { kind, correlationId, from: fields[0], to: fields[1], body: fields[2] } }

    case 'SEND_ACK':
    case 'ACK':
      problem = expectCount(kind, fields, 0)
      if (problem) return malformed(problem)
      return { ok: true, message: { kind, correlationId } }

    case 'LIST_RESPONSE': {
      if (fields.length % 2 !== 0) {
        return malformed(`LIST_RESPONSE expects pairs of fields, got ${fields.length}`)
      }
      const users: UserSummary[] = []
      for (let i = 0; i < fields.length; i += 2) {
        users.push({ username: fields[i], firstName: fields[i + 1] })
      }
      return { ok: true, message: { kind, correlationId, users } }
    }

    case 'RETRIEVE_RESPONSE': {
      if (fields.length % 3 !== 0) {
        return malformed(`RETRIEVE_RESPONSE expects triples of fields, got ${fields.length}`)
      }
      const messages: MailboxEntry[] = []
      for (let i = 0; i < fields.length; i += 3) {
        const sentAt = parseTimestamp(fields[i + 2])
        if (sentAt === undefined) {
          return malformed(`invalid timestamp "${fields[i + 2]}"`)
        }
        messages.push({ from: fields[i], body: fields[i + 1], sentAt })
      }
      return { ok: true, message: { kind, correlationId, messages } }
    }

    case 'ERROR': {
      problem = expectCount(kind, fields, 2)
      if (problem) return malformed(problem)
      const code = fields[0]
      if (!isErrorCode(code)) {
        return malformed(`unknown error code "${code}"`)
      }
      return { ok: true, message: { kind, correlationId, code, message: fields[1] } }
    }

    default: {
      const unreachable: never = kind
      return malformed(`unhandled kind ${String(unreachable)}`)
    }
  }
}

/**
 * Parse a datagram payload. Never throws: anything that is not a well-formed
 * message comes back as a MalformedPacketError value.
 */
export function decode(payload: Buffer): DecodeResult {
  if (payload.length < HEADER_SIZE) {
    return malformed(`${payload.length} bytes is shorter than the ${HEADER_SIZE}-byte header`)
  }

  const version = payload.readUInt8(0)
  if (version !== PROTOCOL_VERSION) {
    return malformed(`unsupported version ${version}`)
  }

  const kind = TAG_KINDS.get(payload.readUInt8(1))
  if (!kind) {
    return malformed(`unknown kind tag ${payload.readUInt8(1)}`)
  }

  const correlationId = payload.readUInt32BE(2)
  const fields = readFields(payload, payload.readUInt16BE(6))
  if (typeof fields === 'string') {
    return malformed(fields)
  }

  return build(kind, correlationId, fields)
}
