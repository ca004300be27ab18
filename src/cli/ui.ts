/**
 * CLI UI utilities
 *
 * - stdout: data only (the --json result)
 * - stderr: progress lines, summary, diagnostics
 */

import { formatRef, type ApplySummary, type ReconcileAction, type ReconcileEvent } from '../domain/types.js'
import { c, symbols } from './lib/colors.js'

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log message to stderr (always shown)
 */
export function progress(message: string): void {
  console.error(message)
}

/**
 * Log verbose message (only with verbose flag)
 */
export function verbose(message: string, enabled: boolean): void {
  if (enabled) {
    console.error(c.muted(`[vaultsmith] ${message}`))
  }
}

/**
 * Log warning message (always shown)
 */
export function warn(message: string): void {
  console.error(`Warning: ${message}`)
}

// ============================================================================
// Reconcile progress
// ============================================================================

const ACTION_VERBS: Record<ReconcileAction, string> = {
  create: 'Creating',
  update: 'Updating',
  verify: 'Verifying',
  regenerate: 'Regenerating'
}

/**
 * Progress line for a terminal event, e.g. `=> Creating SecretsEngine 'kv'... done`.
 * Resources that failed before an action was chosen read "Reconciling".
 * Returns null for `started` events.
 */
export function formatEventLine(event: ReconcileEvent): string | null {
  if (event.phase === 'started') {
    return null
  }

  const verb = event.action ? ACTION_VERBS[event.action] : 'Reconciling'
  const subject = `${verb} ${formatRef(event)}`

  if (event.phase === 'succeeded') {
    return `${symbols.arrow} ${subject}... ${c.success('done')}`
  }
  const cause = event.cause?.message ?? 'unknown error'
  return `${symbols.arrow} ${subject}... ${c.error(`failed: ${cause}`)}`
}

export function formatSummary(summary: ApplySummary): string {
  const noun = summary.total === 1 ? 'resource' : 'resources'
  const failed = summary.failed > 0 ? c.error(`${summary.failed} failed`) : `${summary.failed} failed`
  return `Applied ${summary.total} ${noun}: ${c.success(`${summary.succeeded} succeeded`)}, ${failed} (${summary.elapsedMs} ms)`
}
