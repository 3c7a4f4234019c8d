/**
 * Export Capability Tokens
 *
 * Stateless bearer tokens that let an owner download their own events
 * without a login session. A token is
 *
 *   base64url(JSON {owner, issuedAt}) "." base64url(HMAC-SHA256(secret, payload))
 *
 * with `issuedAt` in epoch seconds. Nothing is persisted, so a token cannot
 * be revoked before it ages out.
 */

import { createHmac, timingSafeEqual } from 'node:crypto'
import { z } from 'zod'
import { BadSignatureError, ExpiredTokenError } from '../errors.js'
import type { Identity } from '../types.js'

export interface ExportTokenPayload {
  owner: Identity
  issuedAt: number
}

export interface ExportTokenIssuerOptions {
  secret: string
  /** Epoch milliseconds; overridable in tests */
  now?: () => number
}

/** Unpadded base64url of a 32-byte HMAC-SHA256 digest */
const SIGNATURE_PATTERN = /^[A-Za-z0-9_-]{43}$/

const payloadSchema = z.object({
  owner: z.number().int().positive(),
  issuedAt: z.number().int().nonnegative(),
})

export class ExportTokenIssuer {
  private readonly secret: string
  private readonly now: () => number

  constructor(options: ExportTokenIssuerOptions) {
    if (!options.secret) {
      throw new Error('Export token secret must not be empty')
    }
    this.secret = options.secret
    this.now = options.now ?? Date.now
  }

  issue(owner: Identity): string {
    const payload: ExportTokenPayload = { owner, issuedAt: this.nowSeconds() }
    const encoded = Buffer.from(JSON.stringify(payload), 'utf-8').toString('base64url')
    return `${encoded}.${this.sign(encoded)}`
  }

  /**
   * Verify a token and return its owner.
   * Throws BadSignatureError for anything forged or malformed, and
   * ExpiredTokenError once it is older than `maxAgeSeconds`.
   */
  redeem(token: string, maxAgeSeconds: number): Identity {
    const payload = this.verify(token)
    const age = this.nowSeconds() - payload.issuedAt
    if (age > maxAgeSeconds) {
      throw new ExpiredTokenError(age, maxAgeSeconds)
    }
    return payload.owner
  }

  private verify(token: string): ExportTokenPayload {
    const parts = token.split('.')
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new BadSignatureError('Malformed token')
    }
    const [encoded, signature] = parts

    // Only the canonical spelling of a signature is accepted: the decoder
    // skips foreign characters and the last character has two unused bits
    if (!SIGNATURE_PATTERN.test(signature)) {
      throw new BadSignatureError('Malformed token')
    }
    const provided = Buffer.from(signature, 'base64url')
    if (provided.toString('base64url') !== signature) {
      throw new BadSignatureError('Malformed token')
    }

    const expected = Buffer.from(this.sign(encoded), 'base64url')
    if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
      throw new BadSignatureError()
    }

    let decoded: unknown
    try {
      decoded = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf-8'))
    } catch {
      throw new BadSignatureError('Malformed token payload')
    }
    const result = payloadSchema.safeParse(decoded)
    if (!result.success) {
      throw new BadSignatureError('Malformed token payload')
    }
    return result.data
  }

  private sign(encodedPayload: string): string {
    return createHmac('sha256', this.secret).update(encodedPayload).digest('base64url')
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000)
  }
}
