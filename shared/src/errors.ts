import type { ProtocolErrorCode } from './protocol/messages'

export type ChatErrorCode =
  | ProtocolErrorCode
  | 'MALFORMED_PACKET'
  | 'DELIVERY_FAILED'
  | 'CANCELLED'
  | 'MESSAGE_TOO_LARGE'
  | 'UNEXPECTED_REPLY'
  | 'NO_SESSION'

/**
 * Base class for every failure the chat layer reports as a value.
 */
export class ChatError extends Error {
  readonly code: ChatErrorCode

  constructor(code: ChatErrorCode, message: string) {
    super(message)
    this.name = 'ChatError'
    this.code = code
  }
}

/**
 * A datagram that could not be decoded. Receivers discard the packet and carry on.
 */
export class MalformedPacketError extends ChatError {
  constructor(reason: string) {
    super('MALFORMED_PACKET', `Malformed packet: ${reason}`)
    this.name = 'MalformedPacketError'
  }
}

/**
 * The retry budget of a reliable send ran out without a matching reply.
 */
export class DeliveryFailedError extends ChatError {
  readonly attempts: number

  constructor(attempts: number) {
    super('DELIVERY_FAILED', `No acknowledgment after ${attempts} attempt${attempts === 1 ? '' : 's'}`)
    this.name = 'DeliveryFailedError'
    this.attempts = attempts
  }
}

/**
 * An application-level refusal sent back by the server in an ERROR reply.
 */
export class ProtocolError extends ChatError {
  constructor(code: ProtocolErrorCode, message: string) {
    super(code, message)
    this.name = 'ProtocolError'
  }
}
