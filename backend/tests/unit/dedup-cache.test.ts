import { describe, it, expect } from 'vitest'
import { DedupCache } from '../../src/server/DedupCache'

const CLIENT = { host: '10.0.0.1', port: 4000 }
const OTHER = { host: '10.0.0.1', port: 4001 }

describe('DedupCache', () => {
  it('should return the remembered reply for the same address and id', () => {
    const cache = new DedupCache()
    cache.remember(CLIENT, 7, { kind: 'SEND_ACK', correlationId: 7 })

    expect(cache.lookup(CLIENT, 7)).toEqual({ kind: 'SEND_ACK', correlationId: 7 })
    expect(cache.lookup(CLIENT, 8)).toBeUndefined()
    expect(cache.lookup(OTHER, 7)).toBeUndefined()
  })

  it('should forget the oldest ids beyond the window', () => {
    const cache = new DedupCache(3)
    for (let id = 1; id <= 4; id++) {
      cache.remember(CLIENT, id, { kind: 'ACK', correlationId: id })
    }

    expect(cache.lookup(CLIENT, 1)).toBeUndefined()
    expect(cache.lookup(CLIENT, 2)).toEqual({ kind: 'ACK', correlationId: 2 })
    expect(cache.size()).toBe(3)
  })

  it('should drop the least recently active address when full', () => {
    const cache = new DedupCache(32, 2)
    const third = { host: '10.0.0.3', port: 4000 }
    cache.remember(CLIENT, 1, { kind: 'ACK', correlationId: 1 })
    cache.remember(OTHER, 1, { kind: 'ACK', correlationId: 1 })
    cache.remember(CLIENT, 2, { kind: 'ACK', correlationId: 2 })
    cache.remember(third, 1, { kind: 'ACK', correlationId: 1 })

    expect(cache.lookup(OTHER, 1)).toBeUndefined()
    expect(cache.lookup(CLIENT, 1)).toEqual({ kind: 'ACK', correlationId: 1 })
    expect(cache.lookup(third, 1)).toEqual({ kind: 'ACK', correlationId: 1 })
  })
})
