/**
 * Process exit codes (sysexits.h where one fits)
 */

import { isConfigError, isManifestError } from '../../lib/errors.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
/** EX_USAGE: manifests rejected before any write */
export const EXIT_USAGE = 64
/** EX_CONFIG */
export const EXIT_CONFIG = 78

export function exitCodeFor(error: unknown): number {
  if (isConfigError(error)) return EXIT_CONFIG
  if (isManifestError(error)) return EXIT_USAGE
  return EXIT_FAILURE
}
