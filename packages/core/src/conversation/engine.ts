/**
 * Conversation Engine
 *
 * Holds at most one multi-step dialog per identity and advances it one
 * input at a time. Inputs for the same identity are serialized; different
 * identities proceed independently.
 */

import type { Logger } from 'pino'
import type { Identity } from '../types.js'
import { KeyedSerialQueue } from '../utils/serial-queue.js'
import { FLOWS } from './flows.js'
import { InMemorySessionStore, type SessionStore } from './session-store.js'
import type {
  CommitHandler,
  ConversationSession,
  FlowCompletion,
  FlowDefinition,
  FlowName,
  StartResult,
  SubmitHooks,
  SubmitResult,
} from './types.js'

export interface ConversationEngineOptions {
  store?: SessionStore
  /** Sessions idle longer than this are discarded (default: 15 minutes) */
  idleTimeoutMs?: number
  /** Clock, overridable in tests */
  now?: () => number
  logger?: Logger
}

const DEFAULT_IDLE_TIMEOUT_MS = 15 * 60 * 1000

/** The mutable part of a session that step advancement touches */
interface StepState<T> {
  step: number
  data: Partial<T>
  updatedAt: number
}

type StepOutcome<T> =
  | { kind: 'advance'; step: number; prompt: string }
  | { kind: 'fail'; reason: string; prompt: string }
  | { kind: 'complete'; fields: T }

type PendingOutcome = Exclude<StepOutcome<unknown>, { kind: 'complete' }>

/** Flow-bound view of a StepValidator */
type DraftCheck<T> = (field: keyof T & string, draft: Partial<T>) => string | null

/**
 * Apply one input to the current step. On success the state moves to the
 * next step, unless this was the last one: then the collected fields are
 * returned and the state is left as it was. A value that parses but fails
 * `check` is treated like a parse failure.
 */
function advanceState<T>(
  state: StepState<T>,
  definition: FlowDefinition<T>,
  raw: string,
  now: number,
  check: DraftCheck<T>,
): StepOutcome<T> {
  const current = definition.steps[state.step]
  if (!current) {
    throw new Error(`Session step ${state.step} is outside a ${definition.steps.length}-step flow`)
  }

  const draft: Partial<T> = { ...state.data }
  const applied = current.apply(draft, raw)
  if (!applied.ok) {
    return { kind: 'fail', reason: applied.reason, prompt: current.prompt }
  }
  const rejected = check(current.field, draft)
  if (rejected !== null) {
    return { kind: 'fail', reason: rejected, prompt: current.prompt }
  }

  const nextStep = state.step + 1
  if (nextStep >= definition.steps.length) {
    const fields = definition.build(draft)
    if (!fields) {
      throw new Error(`Flow finished without collecting ${definition.steps.map((s) => s.field).join(', ')}`)
    }
    return { kind: 'complete', fields }
  }

  state.data = draft
  state.step = nextStep
  state.updatedAt = now
  return { kind: 'advance', step: nextStep, prompt: definition.steps[nextStep].prompt }
}

export class ConversationEngine {
  private readonly store: SessionStore
  private readonly idleTimeoutMs: number
  private readonly now: () => number
  private readonly logger: Logger | undefined
  private readonly queue = new KeyedSerialQueue<Identity>()

  constructor(options: ConversationEngineOptions = {}) {
    this.store = options.store ?? new InMemorySessionStore()
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS
    this.now = options.now ?? Date.now
    this.logger = options.logger
  }

  /**
   * Begin `flow` at step 0 for `identity`. An active session is replaced;
   * the result names the discarded flow so the caller can say so.
   */
  startFlow(identity: Identity, flow: FlowName): Promise<StartResult> {
    return this.queue.run<StartResult>(identity, async () => {
      const previous = await this.load(identity)
      const now = this.now()
      const session = this.createSession(flow, now)
      await this.store.set(identity, session)

      if (previous) {
        this.logger?.info({ identity, from: previous.flow, to: flow }, 'Replaced active flow')
      } else {
        this.logger?.debug({ identity, flow }, 'Started flow')
      }

      return {
        session,
        prompt: FLOWS[flow].steps[0].prompt,
        replaced: previous?.flow ?? null,
      }
    })
  }

  /**
   * Feed one input to the identity's active flow.
   *
   * A parse failure, or a `validate` rejection, leaves the session on the
   * same step. When the last step succeeds, `commit` (if given) runs before
   * the session is destroyed; if it throws, the session stays on its final
   * step and the error propagates.
   */
  submit(identity: Identity, raw: string, hooks: SubmitHooks = {}): Promise<SubmitResult> {
    const { validate, commit } = hooks
    return this.queue.run<SubmitResult>(identity, async () => {
      const session = await this.load(identity)
      if (!session) {
        return { kind: 'no_session' }
      }

      const now = this.now()
      switch (session.flow) {
        case 'CREATE': {
          const outcome = advanceState(session, FLOWS.CREATE, raw, now, (field, data) =>
            validate ? validate({ flow: 'CREATE', field, data }) : null,
          )
          return this.settle(
            identity,
            session,
            outcome.kind === 'complete' ? { kind: 'complete', flow: 'CREATE', fields: outcome.fields } : outcome,
            commit,
          )
        }
        case 'EDIT': {
          const outcome = advanceState(session, FLOWS.EDIT, raw, now, (field, data) =>
            validate ? validate({ flow: 'EDIT', field, data }) : null,
          )
          return this.settle(
            identity,
            session,
            outcome.kind === 'complete' ? { kind: 'complete', flow: 'EDIT', fields: outcome.fields } : outcome,
            commit,
          )
        }
        case 'DELETE': {
          const outcome = advanceState(session, FLOWS.DELETE, raw, now, (field, data) =>
            validate ? validate({ flow: 'DELETE', field, data }) : null,
          )
          return this.settle(
            identity,
            session,
            outcome.kind === 'complete' ? { kind: 'complete', flow: 'DELETE', fields: outcome.fields } : outcome,
            commit,
          )
        }
        case 'INVITE': {
          const outcome = advanceState(session, FLOWS.INVITE, raw, now, (field, data) =>
            validate ? validate({ flow: 'INVITE', field, data }) : null,
          )
          return this.settle(
            identity,
            session,
            outcome.kind === 'complete' ? { kind: 'complete', flow: 'INVITE', fields: outcome.fields } : outcome,
            commit,
          )
        }
      }
    })
  }

  /** Destroy the identity's session. Returns whether one existed. */
  cancel(identity: Identity): Promise<boolean> {
    return this.queue.run(identity, async () => {
      const existed = (await this.load(identity)) !== null
      if (existed) {
        await this.store.delete(identity)
        this.logger?.debug({ identity }, 'Cancelled flow')
      }
      return existed
    })
  }

  /** Current live session, if any */
  peek(identity: Identity): Promise<ConversationSession | null> {
    return this.queue.run(identity, () => this.load(identity))
  }

  /** Resolves once every queued input has been processed */
  idle(): Promise<void> {
    return this.queue.drain()
  }

  // ── Internals ──────────────────────────────────────────────────

  private createSession(flow: FlowName, now: number): ConversationSession {
    switch (flow) {
      case 'CREATE':
        return { flow, step: 0, data: {}, startedAt: now, updatedAt: now }
      case 'EDIT':
        return { flow, step: 0, data: {}, startedAt: now, updatedAt: now }
      case 'DELETE':
        return { flow, step: 0, data: {}, startedAt: now, updatedAt: now }
      case 'INVITE':
        return { flow, step: 0, data: {}, startedAt: now, updatedAt: now }
    }
  }

  /** Fetch a session, dropping it if it sat idle past the timeout */
  private async load(identity: Identity): Promise<ConversationSession | null> {
    const session = await this.store.get(identity)
    if (!session) return null

    if (this.now() - session.updatedAt > this.idleTimeoutMs) {
      await this.store.delete(identity)
      this.logger?.info({ identity, flow: session.flow, step: session.step }, 'Expired idle flow')
      return null
    }
    return session
  }

  private async settle(
    identity: Identity,
    session: ConversationSession,
    outcome: PendingOutcome | FlowCompletion,
    commit: CommitHandler | undefined,
  ): Promise<SubmitResult> {
    switch (outcome.kind) {
      case 'fail':
        return {
          kind: 'fail',
          flow: session.flow,
          step: session.step,
          reason: outcome.reason,
          prompt: outcome.prompt,
        }
      case 'advance':
        await this.store.set(identity, session)
        return { kind: 'advance', flow: session.flow, step: outcome.step, prompt: outcome.prompt }
      case 'complete':
        if (commit) {
          await commit(outcome)
        }
        await this.store.delete(identity)
        this.logger?.debug({ identity, flow: outcome.flow }, 'Completed flow')
        return outcome
    }
  }
}
