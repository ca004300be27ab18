import { describe, it, expect } from 'vitest'
import { EXIT_CONFIG, EXIT_FAILURE, EXIT_USAGE, exitCodeFor } from '../../src/cli/lib/exit-codes.js'
import {
  DependencyCycleError,
  GatewayError,
  InvalidConfigError,
  NoManifestsError
} from '../../src/lib/errors.js'

describe('exitCodeFor', () => {
  it('maps error families to exit codes', () => {
    expect(exitCodeFor(new InvalidConfigError('bad'))).toBe(EXIT_CONFIG)
    expect(exitCodeFor(new NoManifestsError(['x']))).toBe(EXIT_USAGE)
    expect(exitCodeFor(new DependencyCycleError(['a', 'a']))).toBe(EXIT_USAGE)
    expect(exitCodeFor(new GatewayError('down', 'unavailable'))).toBe(EXIT_FAILURE)
    expect(exitCodeFor(new Error('unexpected'))).toBe(EXIT_FAILURE)
  })

  it('uses sysexits values', () => {
    expect([EXIT_FAILURE, EXIT_USAGE, EXIT_CONFIG]).toEqual([1, 64, 78])
  })
})
