/**
 * Protocol message kinds exchanged between chat clients and the directory server.
 *
 * Every datagram carries exactly one message. Requests flow client → server,
 * replies flow server → client and echo the request's correlation id.
 */

export const REQUEST_KINDS = ['CONNECT', 'LIST', 'SEND', 'RETRIEVE', 'DISCONNECT'] as const
export const REPLY_KINDS = [
  'CONNECT_ACK',
  'LIST_RESPONSE',
  'SEND_ACK',
  'RETRIEVE_RESPONSE',
  'ACK',
  'ERROR'
] as const

export type RequestKind = typeof REQUEST_KINDS[number]
export type ReplyKind = typeof REPLY_KINDS[number]
export type MessageKind = RequestKind | ReplyKind

export const ERROR_CODES = [
  'USERNAME_TAKEN',
  'UNKNOWN_RECIPIENT',
  'NOT_CONNECTED',
  'MAILBOX_FULL',
  'BAD_REQUEST'
] as const

export type ProtocolErrorCode = typeof ERROR_CODES[number]

export interface UserSummary {
  username: string
  firstName: string
}

export interface MailboxEntry {
  from: string
  body: string
  sentAt: number
}

export interface ConnectMessage {
  kind: 'CONNECT'
  correlationId: number
  username: string
  firstName: string
}

export interface ConnectAckMessage {
  kind: 'CONNECT_ACK'
  correlationId: number
  username: string
  firstName: string
}

export interface ListMessage {
  kind: 'LIST'
  correlationId: number
  username: string
}

export interface ListResponseMessage {
  kind: 'LIST_RESPONSE'
  correlationId: number
  users: UserSummary[]
}

export interface SendMessage {
  kind: 'SEND'
  correlationId: number
  from: string
  to: string
  body: string
}

export interface SendAckMessage {
  kind: 'SEND_ACK'
  correlationId: number
}

export interface RetrieveMessage {
  kind: 'RETRIEVE'
  correlationId: number
  username: string
}

export interface RetrieveResponseMessage {
  kind: 'RETRIEVE_RESPONSE'
  correlationId: number
  messages: MailboxEntry[]
}

export interface DisconnectMessage {
  kind: 'DISCONNECT'
  correlationId: number
  username: string
}

export interface AckMessage {
  kind: 'ACK'
  correlationId: number
}

export interface ErrorMessage {
  kind: 'ERROR'
  correlationId: number
  code: ProtocolErrorCode
  message: string
}

export type RequestMessage =
  | ConnectMessage
  | ListMessage
  | SendMessage
  | RetrieveMessage
  | DisconnectMessage

export type ReplyMessage =
  | ConnectAckMessage
  | ListResponseMessage
  | SendAckMessage
  | RetrieveResponseMessage
  | AckMessage
  | ErrorMessage

export type ProtocolMessage = RequestMessage | ReplyMessage

export function isRequest(message: ProtocolMessage): message is RequestMessage {
  return REQUEST_KINDS.some(kind => kind === message.kind)
}

export function isReply(message: ProtocolMessage): message is ReplyMessage {
  return !isRequest(message)
}

export function isErrorCode(value: string): value is ProtocolErrorCode {
  return ERROR_CODES.some(code => code === value)
}
