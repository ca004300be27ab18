/**
 * Field-wise comparison of a desired spec against the last-applied snapshot
 */

import type { ResourceKind } from './types.js'

/** Fields that cannot change once the remote object exists */
export const IMMUTABLE_FIELDS: Record<ResourceKind, readonly string[]> = {
  SecretsEngine: ['engine.type', 'engine.local', 'engine.sealWrap', 'engine.externalEntropyAccess'],
  PasswordPolicy: [],
  Issuer: ['certificate', 'chaining'],
  PKIRole: [],
  SSHKey: [],
  Password: []
}

export interface SpecDiff {
  /** Dotted paths whose values differ */
  changed: string[]
  /** Subset of `changed` touching immutable fields */
  immutable: string[]
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value))
}

export function valuesEqual(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]))
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    return collectChanges(a, b, '').length === 0
  }
  return a === b
}

function collectChanges(desired: Record<string, unknown>, current: Record<string, unknown>, prefix: string): string[] {
  const keys = new Set([...Object.keys(desired), ...Object.keys(current)])
  const changed: string[] = []

  for (const key of [...keys].sort()) {
    const path = prefix ? `${prefix}.${key}` : key
    const a = desired[key]
    const b = current[key]

    // A missing key and an undefined value are the same thing
    if (a === undefined && b === undefined) continue

    if (isPlainObject(a) && isPlainObject(b)) {
      changed.push(...collectChanges(a, b, path))
    } else if (!valuesEqual(a, b)) {
      changed.push(path)
    }
  }

  return changed
}

function matchesField(path: string, field: string): boolean {
  return path === field || path.startsWith(`${field}.`)
}

/**
 * Compare two specs of the same kind.
 *
 * @example
 * ```ts
 * diffSpec('SecretsEngine', desired.spec, remote.snapshot)
 * // { changed: ['engine.description'], immutable: [] }
 * ```
 */
export function diffSpec<T extends object>(kind: ResourceKind, desired: T, current: T): SpecDiff {
  const changed = collectChanges(toRecord(desired), toRecord(current), '')
  const immutable = changed.filter(path =>
    IMMUTABLE_FIELDS[kind].some(field => matchesField(path, field))
  )
  return { changed, immutable }
}
