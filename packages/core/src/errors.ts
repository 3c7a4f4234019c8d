/**
 * Error taxonomy
 *
 * Every failure the calendar core reports is a CalendarError with a `kind`
 * discriminator. All kinds are recoverable except `storage_unavailable`,
 * which callers surface as a maintenance condition.
 */

export type CalendarErrorKind =
  | 'parse'
  | 'no_active_session'
  | 'busy'
  | 'not_participant'
  | 'not_owner'
  | 'not_found'
  | 'invalid_transition'
  | 'bad_signature'
  | 'expired'
  | 'storage_unavailable'
  | 'config'

export class CalendarError extends Error {
  readonly kind: CalendarErrorKind

  constructor(kind: CalendarErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.kind = kind
    this.name = new.target.name
  }
}

export class ParseError extends CalendarError {
  constructor(message: string) {
    super('parse', message)
  }
}

export class NoActiveSessionError extends CalendarError {
  constructor(identity: number) {
    super('no_active_session', `No active conversation for ${identity}`)
  }
}

export class BusyError extends CalendarError {
  constructor(
    readonly identity: number,
    readonly date: string,
    readonly time: string,
  ) {
    super('busy', `${identity} already has a meeting at ${date} ${time}`)
  }
}

export class NotParticipantError extends CalendarError {
  constructor(message = 'Not a party to this invitation') {
    super('not_participant', message)
  }
}

export class NotOwnerError extends CalendarError {
  constructor(message = 'Not the owner of this event') {
    super('not_owner', message)
  }
}

export class NotFoundError extends CalendarError {
  constructor(entity: string, id: number | string) {
    super('not_found', `${entity} not found: ${id}`)
  }
}

export class InvalidTransitionError extends CalendarError {
  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super('invalid_transition', `Cannot move invitation from ${from} to ${to}`)
  }
}

export class BadSignatureError extends CalendarError {
  constructor(message = 'Token signature mismatch') {
    super('bad_signature', message)
  }
}

export class ExpiredTokenError extends CalendarError {
  constructor(ageSeconds: number, maxAgeSeconds: number) {
    super('expired', `Token age ${ageSeconds}s exceeds ${maxAgeSeconds}s`)
  }
}

export class StorageUnavailableError extends CalendarError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super('storage_unavailable', `Storage failure during ${operation}: ${detail}`, { cause })
  }
}

export class ConfigError extends CalendarError {
  constructor(message: string) {
    super('config', message)
  }
}

/** Narrow an unknown throwable, optionally to a single kind */
export function isCalendarError(err: unknown, kind?: CalendarErrorKind): err is CalendarError {
  if (!(err instanceof CalendarError)) return false
  return kind === undefined || err.kind === kind
}
