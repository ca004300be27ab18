/**
 * Dependency Graph Builder
 *
 * Interns every resource under an integer handle and links consumers to the
 * producers they reference. Duplicates and cycles are rejected before the
 * graph is returned; references to undeclared resources are collected as
 * external references and resolved against Vault separately.
 */

import pLimit from 'p-limit'
import {
  DependencyCycleError,
  DuplicateResourceError,
  UnresolvedReferenceError
} from '../lib/errors.js'
import type { RemoteStateGateway } from '../gateway/types.js'
import { formatRef, refKey, type Resource, type ResourceRef } from './types.js'

export interface ExternalReference {
  ref: ResourceRef
  /** Handles of the declared resources that reference it */
  referencedBy: number[]
}

export interface DependencyGraph {
  /** Node table; a node's handle is its index */
  readonly nodes: readonly Resource[]
  /** Producer handles per node, in reference order */
  readonly dependencies: readonly (readonly number[])[]
  /** Consumer handles per node */
  readonly dependents: readonly (readonly number[])[]
  readonly externalRefs: readonly ExternalReference[]
  /** Nodes without dependencies */
  readonly roots: readonly number[]
  /** Handle of a declared resource */
  indexOf(ref: ResourceRef): number | undefined
}

function describeSource(resource: Resource): string {
  return resource.source ? `${resource.source.file}#${resource.source.document + 1}` : '<inline>'
}

type VisitMark = 'unvisited' | 'in-stack' | 'done'

/**
 * Depth-first search with an explicit recursion stack. Returns the identities
 * of the first cycle found, with the entry node repeated at the end.
 */
function findCycle(nodes: readonly Resource[], dependencies: readonly (readonly number[])[]): string[] | null {
  const marks = nodes.map((): VisitMark => 'unvisited')
  const stack: number[] = []

  const visit = (index: number): number[] | null => {
    marks[index] = 'in-stack'
    stack.push(index)

    for (const dep of dependencies[index]) {
      if (marks[dep] === 'in-stack') {
        return [...stack.slice(stack.indexOf(dep)), dep]
      }
      if (marks[dep] === 'unvisited') {
        const cycle = visit(dep)
        if (cycle) return cycle
      }
    }

    stack.pop()
    marks[index] = 'done'
    return null
  }

  for (let i = 0; i < nodes.length; i++) {
    if (marks[i] !== 'unvisited') continue
    const cycle = visit(i)
    if (cycle) {
      return cycle.map(index => nodes[index].identity)
    }
  }
  return null
}

/**
 * Build the dependency graph for a set of resources.
 *
 * @throws DuplicateResourceError when two resources share kind and identity
 * @throws DependencyCycleError when references form a cycle
 */
export function buildDependencyGraph(resources: readonly Resource[]): DependencyGraph {
  const index = new Map<string, number>()

  resources.forEach((resource, i) => {
    const key = refKey(resource)
    const existing = index.get(key)
    if (existing !== undefined) {
      throw new DuplicateResourceError(resource.kind, resource.identity, [
        describeSource(resources[existing]),
        describeSource(resource)
      ])
    }
    index.set(key, i)
  })

  const dependencies: number[][] = resources.map(() => [])
  const dependents: number[][] = resources.map(() => [])
  const external = new Map<string, ExternalReference>()

  resources.forEach((resource, i) => {
    for (const ref of resource.dependsOn) {
      const key = refKey(ref)
      const producer = index.get(key)

      if (producer === undefined) {
        const entry = external.get(key)
        if (!entry) {
          external.set(key, { ref, referencedBy: [i] })
        } else if (!entry.referencedBy.includes(i)) {
          entry.referencedBy.push(i)
        }
        continue
      }

      if (!dependencies[i].includes(producer)) {
        dependencies[i].push(producer)
        dependents[producer].push(i)
      }
    }
  })

  const cycle = findCycle(resources, dependencies)
  if (cycle) {
    throw new DependencyCycleError(cycle)
  }

  return {
    nodes: resources,
    dependencies,
    dependents,
    externalRefs: [...external.values()],
    roots: dependencies.flatMap((deps, i) => deps.length === 0 ? [i] : []),
    indexOf: ref => index.get(refKey(ref))
  }
}

const DEFAULT_LOOKUP_CONCURRENCY = 8

export interface ResolveOptions {
  /** Maximum number of lookups in flight */
  concurrency?: number
}

/**
 * Check that every external reference exists in Vault. Reads only.
 *
 * @throws UnresolvedReferenceError listing every missing reference
 */
export async function resolveExternalReferences(
  graph: DependencyGraph,
  gateway: RemoteStateGateway,
  options: ResolveOptions = {}
): Promise<void> {
  const limit = pLimit(options.concurrency ?? DEFAULT_LOOKUP_CONCURRENCY)
  const lookups = await Promise.all(graph.externalRefs.map(external =>
    limit(async () => {
      const remote = await gateway[external.ref.kind].fetch(external.ref.identity)
      return { external, found: remote !== null }
    })
  ))

  const missing = lookups
    .filter(lookup => !lookup.found)
    .map(({ external }) => ({
      target: formatRef(external.ref),
      referencedBy: external.referencedBy.map(i => formatRef(graph.nodes[i]))
    }))

  if (missing.length > 0) {
    throw new UnresolvedReferenceError(missing)
  }
}
