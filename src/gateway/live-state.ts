/**
 * Live-state overlay
 *
 * Vault echoes back the tunable fields of mounts, issuers and roles. Reading
 * them lets a field changed outside vaultsmith show up as a difference against
 * the manifest. Only fields the manifest declares are read back.
 *
 * Vault answers in its own normal form: durations in seconds or as "3h0m0s",
 * comma lists in canonical order. Values equal up to that form count as equal.
 */

import { valuesEqual } from '../domain/diff.js'
import { camelToSnake } from '../lib/case.js'

const DURATION_PATTERN = /^(?:(\d+)d)?(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?$/

/**
 * Seconds of a Vault duration: an integer, a string of digits, or units
 * (`d`, `h`, `m`, `s`) in that order.
 */
export function durationSeconds(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : undefined
  }
  if (typeof value !== 'string' || value === '') return undefined
  if (/^\d+$/.test(value)) return Number(value)

  const match = DURATION_PATTERN.exec(value)
  if (!match) return undefined
  const [days, hours, minutes, seconds] = match.slice(1).map(part => Number(part ?? 0))
  return ((days * 24 + hours) * 60 + minutes) * 60 + seconds
}

function commaSet(value: string): string {
  return value.split(',').map(item => item.trim()).filter(Boolean).sort().join(',')
}

/** Whether a recorded value and the value Vault reports are the same setting */
export function sameSetting(recorded: unknown, live: unknown): boolean {
  if (valuesEqual(recorded, live)) return true

  const seconds = durationSeconds(recorded)
  if (seconds !== undefined && seconds === durationSeconds(live)) return true

  if (typeof recorded === 'string' && typeof live === 'string') {
    return commaSet(recorded) === commaSet(live)
  }
  return false
}

// A duration Vault reports in seconds goes back into a string field as "<n>s"
function inRecordedForm(recorded: unknown, live: unknown): unknown {
  return typeof recorded === 'string' && typeof live === 'number' ? `${live}s` : live
}

/**
 * Fields of `recorded` that Vault reports differently, keyed like `recorded`.
 *
 * @param recorded - last-applied values (camelCase keys)
 * @param declared - the manifest's values; only its defined keys are compared
 * @param live - Vault's response data (snake_case keys)
 */
export function liveChanges(
  recorded: object,
  declared: object,
  live: Record<string, unknown>
): Record<string, unknown> {
  const current = new Map(Object.entries(recorded))
  const changes: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(declared)) {
    if (value === undefined) continue
    const recordedValue = current.get(key)
    const liveValue = live[camelToSnake(key)]
    if (recordedValue === undefined || liveValue === undefined || liveValue === null) continue

    if (!sameSetting(recordedValue, liveValue)) {
      changes[key] = inRecordedForm(recordedValue, liveValue)
    }
  }
  return changes
}
