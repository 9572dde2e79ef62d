export * from './errors'
export * from './protocol/messages'
export * from './protocol/codec'
export * from './network/types'
export * from './network/conditions'
export * from './network/NetworkSimulator'
export * from './network/UDPTransport'
export * from './reliability/ReliableSender'
export * from './reliability/CorrelationIds'
export * from './storage/atomicWrite'
