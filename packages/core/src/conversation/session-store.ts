import type { Identity } from '../types.js'
import type { ConversationSession } from './types.js'

/**
 * Backing store for live conversation sessions, keyed by identity.
 * The engine never touches storage except through this interface.
 */
export interface SessionStore {
  get(identity: Identity): Promise<ConversationSession | null>
  set(identity: Identity, session: ConversationSession): Promise<void>
  /** Returns true if a session was removed */
  delete(identity: Identity): Promise<boolean>
}

/** Process-local store; sessions do not survive a restart */
export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<Identity, ConversationSession>()

  async get(identity: Identity): Promise<ConversationSession | null> {
    return this.sessions.get(identity) ?? null
  }

  async set(identity: Identity, session: ConversationSession): Promise<void> {
    this.sessions.set(identity, session)
  }

  async delete(identity: Identity): Promise<boolean> {
    return this.sessions.delete(identity)
  }

  get size(): number {
    return this.sessions.size
  }
}
