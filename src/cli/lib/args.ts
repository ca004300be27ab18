/**
 * Convert commander option values to CLIArgs
 */

import { InvalidArgumentError, type OptionValues } from 'commander'
import type { CLIArgs } from '../../types.js'

function stringList(value: unknown): string[] {
  if (typeof value === 'string') return [value]
  if (!Array.isArray(value)) return []
  return value.filter((item): item is string => typeof item === 'string')
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

export function toCliArgs(opts: OptionValues): CLIArgs {
  return {
    file: stringList(opts.file),
    recursive: opts.recursive === true,
    concurrency: optionalNumber(opts.concurrency),
    config: optionalString(opts.config),
    json: opts.json === true,
    verbose: opts.verbose === true
  }
}

/**
 * Option parser for positive integers
 *
 * @throws InvalidArgumentError, reported by commander with the option name
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`expected a positive integer, got '${value}'`)
  }
  return parsed
}
