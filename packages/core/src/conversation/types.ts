/**
 * Conversation Engine: Type Definitions
 *
 * Each flow is a fixed sequence of typed steps. A session is tagged by its
 * flow, so `data` is checked against that flow's field set.
 */

import type { ClockTime, Identity, IsoDate } from '../types.js'

// ─────────────────────────────────────────────────────────────────
// Flows
// ─────────────────────────────────────────────────────────────────

/** Fields each flow collects, in step order */
export interface FlowFields {
  CREATE: {
    title: string
    date: IsoDate
    time: ClockTime
    details: string
  }
  EDIT: {
    targetId: number
    newDetails: string
  }
  DELETE: {
    targetId: number
  }
  INVITE: {
    participant: Identity
    targetEventId: number
    /** null when the user skipped; the event's own details apply */
    details: string | null
  }
}

export type FlowName = keyof FlowFields

// ─────────────────────────────────────────────────────────────────
// Steps
// ─────────────────────────────────────────────────────────────────

export type StepParse<V> = { ok: true; value: V } | { ok: false; reason: string }

/** Parses one raw input into a typed value */
export type StepParser<V> = (raw: string) => StepParse<V>

/** A bound step: knows which field of T it fills */
export interface FlowStep<T> {
  field: keyof T & string
  prompt: string
  /** Writes the parsed value into `draft` on success; leaves it alone otherwise */
  apply(draft: Partial<T>, raw: string): { ok: true } | { ok: false; reason: string }
}

export interface FlowDefinition<T> {
  steps: readonly FlowStep<T>[]
  /** Assemble the final record; null if a field is missing */
  build(draft: Partial<T>): T | null
}

// ─────────────────────────────────────────────────────────────────
// Sessions
// ─────────────────────────────────────────────────────────────────

export interface FlowSession<F extends FlowName> {
  flow: F
  /** Index of the step awaiting input */
  step: number
  data: Partial<FlowFields[F]>
  startedAt: number
  updatedAt: number
}

export type ConversationSession = { [F in FlowName]: FlowSession<F> }[FlowName]

// ─────────────────────────────────────────────────────────────────
// Results
// ─────────────────────────────────────────────────────────────────

export type FlowCompletion = {
  [F in FlowName]: { kind: 'complete'; flow: F; fields: FlowFields[F] }
}[FlowName]

export type SubmitResult =
  | { kind: 'no_session' }
  | { kind: 'advance'; flow: FlowName; step: number; prompt: string }
  | { kind: 'fail'; flow: FlowName; step: number; reason: string; prompt: string }
  | FlowCompletion

export interface StartResult {
  session: ConversationSession
  /** Prompt for step 0 */
  prompt: string
  /** Flow that was active and got discarded, if any */
  replaced: FlowName | null
}

/** Runs after a flow completes; a throw keeps the session at its final step */
export type CommitHandler = (completion: FlowCompletion) => Promise<void> | void

/** A step value that parsed, shown in the draft it would be kept in */
export type StepCheck = {
  [F in FlowName]: { flow: F; field: keyof FlowFields[F] & string; data: Partial<FlowFields[F]> }
}[FlowName]

/**
 * Checks a parsed value against state the engine cannot see (ownership,
 * the sender's own identity). Returns a reason to re-ask the step, or null.
 */
export type StepValidator = (check: StepCheck) => string | null

export interface SubmitHooks {
  validate?: StepValidator
  commit?: CommitHandler
}
