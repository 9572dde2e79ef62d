import { sameAddress, type Address, type UserSummary } from '@dgram-chat/shared'

export interface User {
  username: string
  firstName: string
  address: Address
  connectedAt: number
  lastSeen: number
}

export type ConnectOutcome =
  | { ok: true; user: User; created: boolean }
  | { ok: false; code: 'USERNAME_TAKEN'; holder: Address }

/**
 * Authoritative map of connected users to the address they were last seen at.
 * A username belongs to at most one address at a time.
 */
export class Directory {
  private users: Map<string, User> = new Map()

  connect(username: string, firstName: string, address: Address, now: number = Date.now()): ConnectOutcome {
    const existing = this.users.get(username)

    if (existing && !sameAddress(existing.address, address)) {
      return { ok: false, code: 'USERNAME_TAKEN', holder: { ...existing.address } }
    }

    if (existing) {
      existing.firstName = firstName
      existing.lastSeen = now
      return { ok: true, user: { ...existing, address: { ...existing.address } }, created: false }
    }

    const user: User = {
      username,
      firstName,
      address: { ...address },
      connectedAt: now,
      lastSeen: now
    }
    this.users.set(username, user)
    return { ok: true, user: { ...user, address: { ...user.address } }, created: true }
  }

  lookup(username: string): User | undefined {
    const user = this.users.get(username)
    return user ? { ...user, address: { ...user.address } } : undefined
  }

  isConnectedFrom(username: string, address: Address): boolean {
    const user = this.users.get(username)
    return user !== undefined && sameAddress(user.address, address)
  }

  touch(username: string, now: number = Date.now()) {
    const user = this.users.get(username)
    if (user) {
      user.lastSeen = now
    }
  }

  /**
   * Remove a user, but only on behalf of the address holding the name.
   */
  disconnect(username: string, address: Address): boolean {
    if (!this.isConnectedFrom(username, address)) return false
    return this.users.delete(username)
  }

  list(): User[] {
    return Array.from(this.users.values(), user => ({ ...user, address: { ...user.address } }))
  }

  summaries(): UserSummary[] {
    return Array.from(this.users.values(), ({ username, firstName }) => ({ username, firstName }))
  }

  /**
   * Drop users idle for longer than ttlMs. Returns the evicted usernames.
   */
  evictIdle(now: number, ttlMs: number): string[] {
    const evicted: string[] = []
    for (const [username, user] of this.users) {
      if (now - user.lastSeen > ttlMs) {
        this.users.delete(username)
        evicted.push(username)
      }
    }
    return evicted
  }

  size(): number {
    return this.users.size
  }
}
