import { parseDate, parseTime } from '../utils/datetime.js'
import { parseIdentity } from '../types.js'
import type { FlowStep, StepParser } from './types.js'

/** Inputs that mean "leave this optional field empty" */
const SKIP_MARKERS = new Set(['skip', '-'])

export function text(emptyReason = 'This value cannot be empty.'): StepParser<string> {
  return (raw) => {
    const value = raw.trim()
    return value ? { ok: true, value } : { ok: false, reason: emptyReason }
  }
}

export function optionalText(): StepParser<string | null> {
  return (raw) => {
    const value = raw.trim()
    if (!value || SKIP_MARKERS.has(value.toLowerCase())) return { ok: true, value: null }
    return { ok: true, value }
  }
}

export function date(): StepParser<string> {
  return (raw) => {
    const value = parseDate(raw)
    return value ? { ok: true, value } : { ok: false, reason: 'Invalid date. Example: 2025-11-03.' }
  }
}

export function time(): StepParser<string> {
  return (raw) => {
    const value = parseTime(raw)
    return value ? { ok: true, value } : { ok: false, reason: 'Invalid time. Example: 09:05.' }
  }
}

export function positiveId(reason = 'The ID must be a positive number.'): StepParser<number> {
  return (raw) => {
    const value = parseIdentity(raw)
    return value === null ? { ok: false, reason } : { ok: true, value }
  }
}

/**
 * Step builder bound to one flow's field set:
 *
 *   const step = stepsFor<FlowFields['EDIT']>()
 *   step('targetId', 'Enter the ID:', positiveId())
 */
export function stepsFor<T>() {
  return <K extends keyof T & string>(field: K, prompt: string, parse: StepParser<T[K]>): FlowStep<T> => ({
    field,
    prompt,
    apply(draft, raw) {
      const parsed = parse(raw)
      if (!parsed.ok) return { ok: false, reason: parsed.reason }
      draft[field] = parsed.value
      return { ok: true }
    },
  })
}
