/**
 * Shared domain types.
 *
 * Identity is the messaging-platform account id. Dates are ISO calendar
 * dates (`yyyy-MM-dd`) and times are wall-clock `HH:mm`, both stored as
 * strings so they compare lexicographically.
 */

/** Stable user key from the messaging platform */
export type Identity = number

/** Calendar date, `yyyy-MM-dd` */
export type IsoDate = string

/** Wall-clock time, `HH:mm` */
export type ClockTime = string

// ─────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────

export interface CalendarEvent {
  id: number
  owner: Identity
  title: string
  date: IsoDate
  time: ClockTime
  details: string
  isPublic: boolean
}

export interface CreateEventInput {
  title: string
  date: IsoDate
  time: ClockTime
  details: string
  isPublic?: boolean
}

// ─────────────────────────────────────────────────────────────────
// Invitations
// ─────────────────────────────────────────────────────────────────

export type InvitationStatus = 'pending' | 'confirmed' | 'declined' | 'cancelled'

/** Statuses that occupy a slot */
export const BLOCKING_STATUSES: readonly InvitationStatus[] = ['pending', 'confirmed']

export type InvitationDecision = 'confirm' | 'decline'

export interface Invitation {
  id: number
  /** Logical reference to CalendarEvent.id (not enforced by storage) */
  eventRef: number
  organizer: Identity
  participant: Identity
  date: IsoDate
  time: ClockTime
  details: string
  status: InvitationStatus
  createdAt: Date
  updatedAt: Date
}

export interface CreateInvitationInput {
  organizer: Identity
  participant: Identity
  eventRef: number
  date: IsoDate
  time: ClockTime
  details: string
}

// ─────────────────────────────────────────────────────────────────
// Users & statistics
// ─────────────────────────────────────────────────────────────────

export interface RegisteredUser {
  identity: Identity
  username: string
  firstName: string
  createdAt: Date
}

export type StatisticsCounter =
  | 'userCount'
  | 'eventCount'
  | 'editedEvents'
  | 'cancelledEvents'
  | 'invitationsCreated'
  | 'invitationsConfirmed'
  | 'invitationsDeclined'
  | 'invitationsCancelled'

export type DailyStatistics = { date: IsoDate } & Record<StatisticsCounter, number>

/** Parse a user-supplied identity; positive integers only */
export function parseIdentity(raw: string): Identity | null {
  const trimmed = raw.trim()
  if (!/^\d+$/.test(trimmed)) return null
  const value = Number(trimmed)
  if (!Number.isSafeInteger(value) || value <= 0) return null
  return value
}
