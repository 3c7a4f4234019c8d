import { describe, it, expect } from 'vitest'
import { ExportTokenIssuer } from '../src/export/token.js'
import { toCsv, toExportRows, toJsonExport, isExportFormat } from '../src/export/serialize.js'
import { BadSignatureError, ExpiredTokenError, isCalendarError } from '../src/errors.js'
import type { CalendarEvent } from '../src/types.js'

const SECRET = 'test-secret'

function issuerAt(clock: { now: number }, secret = SECRET): ExportTokenIssuer {
  return new ExportTokenIssuer({ secret, now: () => clock.now })
}

function redeemError(issuer: ExportTokenIssuer, token: string, maxAge = 900): unknown {
  try {
    issuer.redeem(token, maxAge)
  } catch (err) {
    return err
  }
  throw new Error('expected redeem to throw')
}

// -------------------------------------------------------------------
// Issue / redeem
// -------------------------------------------------------------------

describe('ExportTokenIssuer', () => {
  it('produces payload.signature in base64url', () => {
    const token = issuerAt({ now: 1_700_000_000_000 }).issue(42)
    expect(token).toMatch(/^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/)

    const [payload] = token.split('.')
    expect(JSON.parse(Buffer.from(payload, 'base64url').toString('utf-8'))).toEqual({
      owner: 42,
      issuedAt: 1_700_000_000,
    })
  })

  it('round-trips immediately for any non-negative max age', () => {
    const issuer = issuerAt({ now: 1_700_000_000_000 })
    const token = issuer.issue(42)
    expect(issuer.redeem(token, 0)).toBe(42)
    expect(issuer.redeem(token, 900)).toBe(42)
  })

  it('accepts a token exactly at max age and rejects it one second later', () => {
    const clock = { now: 1_700_000_000_000 }
    const issuer = issuerAt(clock)
    const token = issuer.issue(7)

    clock.now += 900_000
    expect(issuer.redeem(token, 900)).toBe(7)

    clock.now += 1_000
    const err = redeemError(issuer, token)
    expect(err).toBeInstanceOf(ExpiredTokenError)
    expect(isCalendarError(err, 'expired')).toBe(true)
  })

  it('rejects a payload swapped under the original signature', () => {
    const issuer = issuerAt({ now: 1_700_000_000_000 })
    const [, signature] = issuer.issue(42).split('.')
    const forged = Buffer.from(JSON.stringify({ owner: 43, issuedAt: 1_700_000_000 })).toString('base64url')

    expect(redeemError(issuer, `${forged}.${signature}`)).toBeInstanceOf(BadSignatureError)
  })

  it('rejects tokens signed with another secret', () => {
    const clock = { now: 1_700_000_000_000 }
    const token = issuerAt(clock, 'other-secret').issue(42)
    expect(redeemError(issuerAt(clock), token)).toBeInstanceOf(BadSignatureError)
  })

  it('rejects malformed tokens as bad signatures', () => {
    const issuer = issuerAt({ now: 0 })
    for (const token of ['', 'abc', 'a.b.c', '.sig', 'payload.']) {
      expect(isCalendarError(redeemError(issuer, token), 'bad_signature')).toBe(true)
    }
  })

  it('accepts only the exact signature string it issued', () => {
    const issuer = issuerAt({ now: 1_700_000_000_000 })
    const [payload, signature] = issuer.issue(42).split('.')
    const alphabet = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_'

    // Same decoded bytes: a character outside the alphabet, and a flip of an unused trailing bit
    const padded = `${signature.slice(0, 10)}!${signature.slice(10)}`
    const last = alphabet.indexOf(signature[signature.length - 1])
    const twin = `${signature.slice(0, -1)}${alphabet[last ^ 1]}`
    expect(Buffer.from(twin, 'base64url').equals(Buffer.from(signature, 'base64url'))).toBe(true)

    for (const variant of [padded, twin, `${signature}=`]) {
      expect(redeemError(issuer, `${payload}.${variant}`)).toBeInstanceOf(BadSignatureError)
    }
    expect(issuer.redeem(`${payload}.${signature}`, 900)).toBe(42)
  })

  it('refuses an empty secret', () => {
    expect(() => new ExportTokenIssuer({ secret: '' })).toThrow('Export token secret must not be empty')
  })
})

// -------------------------------------------------------------------
// Serialization
// -------------------------------------------------------------------

describe('export serialization', () => {
  const events: CalendarEvent[] = [
    {
      id: 1,
      owner: 7,
      title: 'Standup',
      date: '2025-12-12',
      time: '12:00',
      details: 'Room 4; floor 2',
      isPublic: false,
    },
    {
      id: 2,
      owner: 7,
      title: 'Review "Q4"',
      date: '2025-12-13',
      time: '09:30',
      details: '',
      isPublic: true,
    },
  ]

  it('maps events to export rows with seconds on the time', () => {
    expect(toExportRows(events)[0]).toEqual({
      id: 1,
      name: 'Standup',
      date: '2025-12-12',
      time: '12:00:00',
      details: 'Room 4; floor 2',
      tg_user_id: 7,
    })
  })

  it('writes semicolon CSV with a BOM and quoted cells where needed', () => {
    expect(toCsv(toExportRows(events))).toBe(
      '\uFEFFid;name;date;time;details;tg_user_id\r\n' +
        '1;Standup;2025-12-12;12:00:00;"Room 4; floor 2";7\r\n' +
        '2;"Review ""Q4""";2025-12-13;09:30:00;;7\r\n',
    )
  })

  it('writes only the header for an empty list', () => {
    expect(toCsv([])).toBe('\uFEFFid;name;date;time;details;tg_user_id\r\n')
  })

  it('wraps rows with the owner for JSON', () => {
    const body = toJsonExport(7, toExportRows(events.slice(1)))
    expect(body).toEqual({
      owner: 7,
      events: [{ id: 2, name: 'Review "Q4"', date: '2025-12-13', time: '09:30:00', details: '', tg_user_id: 7 }],
    })
  })

  it('recognizes the two formats only', () => {
    expect(isExportFormat('json')).toBe(true)
    expect(isExportFormat('csv')).toBe(true)
    expect(isExportFormat('xml')).toBe(false)
  })
})
