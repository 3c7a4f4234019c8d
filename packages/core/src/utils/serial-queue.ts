/**
 * Keyed serial queue: runs tasks for the same key one at a time, in
 * submission order. Tasks for different keys run concurrently.
 *
 * A failed task rejects its own promise only; the next task for the key
 * still runs.
 */
export class KeyedSerialQueue<K> {
  private tails = new Map<K, Promise<void>>()

  run<T>(key: K, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(() => task())

    const tail = result.then(
      () => undefined,
      () => undefined,
    )
    this.tails.set(key, tail)
    void tail.then(() => {
      // Drop the chain once nothing else was queued behind this task
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    })

    return result
  }

  /** Number of keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size
  }

  /** Wait until every queued task has settled */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values())
    }
  }
}
