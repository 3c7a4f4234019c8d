/**
 * Inbound Message Deduplication
 *
 * Channels may redeliver a message after a reconnect. The cache remembers
 * keys for a TTL window, with lazy pruning once it grows past its cap.
 */

export interface DedupOptions {
  /** Maximum number of remembered keys (default: 5000) */
  maxEntries?: number
  /** Time-to-live in milliseconds (default: 20 minutes) */
  ttlMs?: number
  /** Clock, overridable in tests */
  now?: () => number
}

const DEFAULT_MAX_ENTRIES = 5000
const DEFAULT_TTL_MS = 20 * 60 * 1000

export class DedupCache {
  private seen = new Map<string, number>() // key → first-seen timestamp
  private readonly maxEntries: number
  private readonly ttlMs: number
  private readonly now: () => number

  constructor(options: DedupOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS
    this.now = options.now ?? Date.now
  }

  /**
   * Returns true when the key was already seen inside the TTL window.
   * Otherwise records it and returns false.
   */
  isDuplicate(key: string): boolean {
    const now = this.now()
    const seenAt = this.seen.get(key)
    if (seenAt !== undefined && now - seenAt < this.ttlMs) {
      return true
    }
    // Re-inserting moves the key to the back of the iteration order
    this.seen.delete(key)

    if (this.seen.size >= this.maxEntries) {
      this.prune(now)
    }
    while (this.seen.size >= this.maxEntries) {
      const oldest = this.seen.keys().next()
      if (oldest.done) break
      this.seen.delete(oldest.value)
    }

    this.seen.set(key, now)
    return false
  }

  private prune(now: number): void {
    for (const [key, seenAt] of this.seen) {
      if (now - seenAt >= this.ttlMs) {
        this.seen.delete(key)
      }
    }
  }

  get size(): number {
    return this.seen.size
  }

  clear(): void {
    this.seen.clear()
  }
}
