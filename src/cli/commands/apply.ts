/**
 * `apply` Command
 *
 * Reconciles the resources declared in the given manifests against Vault.
 *
 * Usage:
 *   vaultsmith apply -f manifests/            All *.yaml / *.yml in a directory
 *   vaultsmith apply -f manifests/ -r         ... and its sub-directories
 *   vaultsmith apply -f - < app.yaml          Read a manifest from stdin
 *   vaultsmith apply -f app.yaml --json       Print the result as JSON on stdout
 */

import { reconcile } from '../../domain/apply.js'
import { buildDependencyGraph, resolveExternalReferences } from '../../domain/graph.js'
import { emptyApplySummary, type ApplyResult } from '../../domain/types.js'
import { loadConfig, type EnvMap } from '../../lib/config-loader.js'
import { loadManifests } from '../../lib/manifest-loader.js'
import type { CLIArgs, FetchLike } from '../../types.js'
import { withGateway } from '../lib/create-gateway.js'
import * as ui from '../ui.js'

export interface ApplyContext {
  args: CLIArgs
  signal?: AbortSignal
  cwd?: string
  env?: EnvMap
  /** Replace the HTTP transport */
  fetch?: FetchLike
  readStdin?: () => Promise<string>
}

// ============================================================================
// Apply Command
// ============================================================================

/**
 * Load, validate and reconcile. Manifest and config errors are thrown before
 * Vault is contacted; per-resource failures are part of the returned result.
 */
export async function runApply(context: ApplyContext): Promise<ApplyResult> {
  const { args, signal } = context
  const cwd = context.cwd ?? process.cwd()

  const config = loadConfig({ configPath: args.config, cwd, env: context.env })
  const resources = await loadManifests(args.file, {
    recursive: args.recursive,
    cwd,
    readStdin: context.readStdin
  })
  const graph = buildDependencyGraph(resources)

  ui.verbose(`${graph.nodes.length} resources, ${graph.externalRefs.length} external references`, args.verbose)

  if (graph.nodes.length === 0) {
    const result: ApplyResult = { success: true, ...emptyApplySummary(), outcomes: [] }
    report(result, args)
    return result
  }

  const result = await withGateway(
    { config, verbose: args.verbose, fetch: context.fetch },
    async ({ client, gateway }) => {
      const concurrency = args.concurrency ?? config.concurrency
      await client.authenticate()
      await resolveExternalReferences(graph, gateway, { concurrency })
      await gateway.prepare()

      return reconcile(graph, gateway, {
        concurrency,
        signal,
        onEvent: event => {
          const line = ui.formatEventLine(event)
          if (line) ui.progress(line)
        }
      })
    }
  )

  report(result, args)
  return result
}

function report(result: ApplyResult, args: CLIArgs): void {
  ui.progress(ui.formatSummary(result))
  if (args.json) {
    ui.output(JSON.stringify(result, null, 2))
  }
}
