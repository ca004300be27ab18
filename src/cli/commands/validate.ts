/**
 * `validate` Command
 *
 * Parses manifests and builds the dependency graph without contacting Vault.
 *
 * Usage:
 *   vaultsmith validate -f manifests/ -r
 */

import { buildDependencyGraph, type DependencyGraph } from '../../domain/graph.js'
import { formatRef } from '../../domain/types.js'
import { loadManifests } from '../../lib/manifest-loader.js'
import type { CLIArgs } from '../../types.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'

export interface ValidateContext {
  args: CLIArgs
  cwd?: string
  readStdin?: () => Promise<string>
}

export async function runValidate(context: ValidateContext): Promise<DependencyGraph> {
  const { args } = context
  const resources = await loadManifests(args.file, {
    recursive: args.recursive,
    cwd: context.cwd,
    readStdin: context.readStdin
  })
  const graph = buildDependencyGraph(resources)

  if (args.json) {
    ui.output(JSON.stringify({
      resources: graph.nodes.map(({ kind, identity }) => ({ kind, identity })),
      externalReferences: graph.externalRefs.map(external => external.ref)
    }, null, 2))
    return graph
  }

  print.success(`${graph.nodes.length} resources valid`)
  for (const external of graph.externalRefs) {
    // Checked against Vault at apply time
    ui.progress(`  ${c.label('external:')} ${formatRef(external.ref)}`)
  }
  return graph
}
