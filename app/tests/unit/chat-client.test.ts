import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createHarness, SERVER, wait, type Harness } from '../support/harness'

describe('ChatClient', () => {
  let harness: Harness

  beforeEach(() => {
    harness = createHarness()
  })

  afterEach(async () => {
    await harness.dispose()
  })

  it('should persist the session after connecting', async () => {
    const alice = harness.createClient('alice')

    const result = await alice.connect('alice', 'Alice')

    expect(result.ok).toBe(true)
    expect(alice.currentSession).toMatchObject({ username: 'alice', firstName: 'Alice', server: SERVER })
    expect(await harness.sessionStore('alice').load()).toEqual(alice.currentSession)
  })

  it('should require a session for list, send and retrieve', async () => {
    const client = harness.createClient('nobody')

    for (const result of [await client.listUsers(), await client.sendMessage('bob', 'hi'), await client.retrieveMessages()]) {
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe('NO_SESSION')
    }
  })

  it('should refuse a message too large for one datagram without sending it', async () => {
    const alice = harness.createClient('alice')
    await alice.connect('alice', 'Alice')
    const sentBefore = harness.network.getStats().packetsSent

    const result = await alice.sendMessage('bob', 'x'.repeat(70000))

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('MESSAGE_TOO_LARGE')
    expect(harness.network.getStats().packetsSent).toBe(sentBefore)
  })

  it('should pass server validation errors through', async () => {
    const client = harness.createClient('spaces')

    const result = await client.connect('two words', 'Alice')

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('BAD_REQUEST')
      expect(result.error.message).toBe('Username cannot contain whitespace')
    }
  })

  it('should not resume a session saved for another server', async () => {
    await harness.sessionStore('alice').save({
      username: 'alice',
      firstName: 'Alice',
      server: { host: '127.0.0.1', port: 13000 },
      savedAt: 1
    })
    const alice = harness.createClient('alice')

    expect(await alice.resume()).toBeNull()
    expect(alice.currentSession).toBeNull()
  })

  it('should cancel an in-flight request on shutdown', async () => {
    const client = harness.createClient('lonely', { server: { host: '127.0.0.1', port: 9 }, timeoutMs: 5000 })

    const pending = client.connect('lonely', 'Lonely')
    await wait(5)
    await client.shutdown()

    const result = await pending
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('CANCELLED')
  })

  it('should refuse new requests after shutdown', async () => {
    const alice = harness.createClient('alice')
    await alice.connect('alice', 'Alice')
    await alice.shutdown()
    await alice.shutdown()

    const result = await alice.listUsers()
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('CANCELLED')
  })

  it('should say goodbye to the server on shutdown and keep the saved session', async () => {
    const alice = harness.createClient('alice')
    await alice.connect('alice', 'Alice')

    await alice.shutdown()
    await wait(10)

    expect(harness.server.directory.lookup('alice')).toBeUndefined()
    expect(await harness.sessionStore('alice').load()).toMatchObject({ username: 'alice' })
  })
})
