import { describe, it, expect } from 'vitest'
import { DedupCache } from '../src/utils/dedup.js'
import { KeyedSerialQueue } from '../src/utils/serial-queue.js'
import { parseDate, parseTime, withSeconds } from '../src/utils/datetime.js'
import { parseIdentity } from '../src/types.js'

// -------------------------------------------------------------------
// DedupCache
// -------------------------------------------------------------------

describe('DedupCache', () => {
  it('flags a key seen inside the TTL window', () => {
    const clock = { now: 0 }
    const cache = new DedupCache({ ttlMs: 1000, now: () => clock.now })

    expect(cache.isDuplicate('console:1:m1')).toBe(false)
    clock.now = 999
    expect(cache.isDuplicate('console:1:m1')).toBe(true)
  })

  it('forgets a key once the TTL passes', () => {
    const clock = { now: 0 }
    const cache = new DedupCache({ ttlMs: 1000, now: () => clock.now })

    cache.isDuplicate('k')
    clock.now = 1000
    expect(cache.isDuplicate('k')).toBe(false)
  })

  it('evicts the oldest key at capacity', () => {
    const cache = new DedupCache({ maxEntries: 2, now: () => 0 })
    cache.isDuplicate('a')
    cache.isDuplicate('b')
    cache.isDuplicate('c')

    expect(cache.size).toBe(2)
    expect(cache.isDuplicate('c')).toBe(true)
    // 'a' was evicted, so it reads as new (and evicts 'b')
    expect(cache.isDuplicate('a')).toBe(false)
  })
})

// -------------------------------------------------------------------
// KeyedSerialQueue
// -------------------------------------------------------------------

describe('KeyedSerialQueue', () => {
  it('runs tasks for one key strictly in order', async () => {
    const queue = new KeyedSerialQueue<number>()
    const order: string[] = []

    const slow = queue.run(1, async () => {
      await new Promise((r) => setTimeout(r, 20))
      order.push('first')
    })
    const fast = queue.run(1, () => {
      order.push('second')
    })

    await Promise.all([slow, fast])
    expect(order).toEqual(['first', 'second'])
  })

  it('lets different keys overlap', async () => {
    const queue = new KeyedSerialQueue<number>()
    const order: string[] = []

    const a = queue.run(1, async () => {
      await new Promise((r) => setTimeout(r, 20))
      order.push('key1')
    })
    const b = queue.run(2, () => {
      order.push('key2')
    })

    await Promise.all([a, b])
    expect(order).toEqual(['key2', 'key1'])
  })

  it('keeps going after a failed task', async () => {
    const queue = new KeyedSerialQueue<number>()
    const failed = queue.run(1, () => {
      throw new Error('boom')
    })
    const next = queue.run(1, () => 'ok')

    await expect(failed).rejects.toThrow('boom')
    await expect(next).resolves.toBe('ok')
  })

  it('releases keys once drained', async () => {
    const queue = new KeyedSerialQueue<string>()
    void queue.run('a', () => undefined)
    void queue.run('b', () => undefined)
    await queue.drain()
    expect(queue.activeKeys).toBe(0)
  })
})

// -------------------------------------------------------------------
// Parsing helpers
// -------------------------------------------------------------------

describe('parseDate / parseTime', () => {
  it('accepts strict calendar dates', () => {
    expect(parseDate('2025-12-12')).toBe('2025-12-12')
    expect(parseDate(' 2024-02-29 ')).toBe('2024-02-29')
  })

  it('rejects impossible or loosely formatted dates', () => {
    expect(parseDate('2025-02-29')).toBeNull()
    expect(parseDate('2025-13-01')).toBeNull()
    expect(parseDate('2025-1-5')).toBeNull()
    expect(parseDate('12.12.2025')).toBeNull()
  })

  it('accepts 24-hour HH:MM only', () => {
    expect(parseTime('00:00')).toBe('00:00')
    expect(parseTime('23:59')).toBe('23:59')
    expect(parseTime('24:00')).toBeNull()
    expect(parseTime('7:30')).toBeNull()
    expect(parseTime('07:30:00')).toBeNull()
  })

  it('appends seconds for exports', () => {
    expect(withSeconds('09:05')).toBe('09:05:00')
  })
})

describe('parseIdentity', () => {
  it('accepts positive integers', () => {
    expect(parseIdentity('42')).toBe(42)
    expect(parseIdentity(' 7 ')).toBe(7)
  })

  it('rejects zero, negatives and non-digits', () => {
    for (const raw of ['0', '-3', '1.5', 'abc', '', '99999999999999999999']) {
      expect(parseIdentity(raw)).toBeNull()
    }
  })
})
