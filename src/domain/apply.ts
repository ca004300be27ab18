/**
 * Vaultsmith Reconciler
 *
 * Drives every node of a dependency graph through its state machine:
 *
 *   pending → waiting → fetching → creating | updating | verifying | regenerating → succeeded | failed
 *
 * One task per node; a node leaves `waiting` once every producer it depends on
 * has succeeded, and fails without touching Vault as soon as one has failed.
 * Gateway calls share a single p-limit limiter.
 */

import pLimit from 'p-limit'
import {
  CancelledError,
  DependencyBlockedError,
  ImmutableFieldError,
  PasswordPolicyNotFoundError,
  UnmanagedResourceError,
  VaultsmithError,
  wrapError
} from '../lib/errors.js'
import { generatePassword as defaultGeneratePassword } from '../lib/password-generator.js'
import { generateSSHKey as defaultGenerateSSHKey } from '../lib/ssh-keygen.js'
import type { RemoteState, RemoteStateGateway, SSHKeyMaterial } from '../gateway/types.js'
import { diffSpec } from './diff.js'
import type { DependencyGraph } from './graph.js'
import {
  ACTION_STATES,
  formatRef,
  normalizePath,
  type ApplyResult,
  type PasswordPolicyParams,
  type ReconcileAction,
  type ReconcileEvent,
  type Resource,
  type ResourceKind,
  type ResourceOfKind,
  type ResourceOutcome,
  type ResourceState,
  type SSHKeyOptions,
  type StateChange
} from './types.js'
import { decideSecretAction } from './versioning.js'

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_CONCURRENCY = 8

export interface ReconcileOptions {
  /** Maximum number of gateway calls in flight */
  concurrency?: number
  signal?: AbortSignal
  onEvent?: (event: ReconcileEvent) => void
  onStateChange?: (change: StateChange) => void
  generatePassword?: (policy: PasswordPolicyParams) => string | Promise<string>
  generateSSHKey?: (options: SSHKeyOptions) => Promise<SSHKeyMaterial>
}

interface NodePlan {
  action: ReconcileAction
  execute: () => Promise<unknown>
}

interface SpecOperations<K extends ResourceKind> {
  fetch: () => Promise<RemoteState<K> | null>
  create: () => Promise<RemoteState<K>>
  update: (current: RemoteState<K>) => Promise<RemoteState<K>>
}

type DependencyGate =
  | { type: 'ready' }
  | { type: 'blocked'; dependency: number }
  | { type: 'cancelled' }

interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
}

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined
  const promise = new Promise<T>(res => {
    resolve = res
  })
  return { promise, resolve }
}

const noop = async (): Promise<void> => undefined

// ============================================================================
// Reconciliation
// ============================================================================

/**
 * Reconcile every resource of the graph against the gateway.
 *
 * Never rejects for per-resource failures: they are reported as failed
 * outcomes. Independent subgraphs always run to completion.
 */
export async function reconcile(
  graph: DependencyGraph,
  gateway: RemoteStateGateway,
  options: ReconcileOptions = {}
): Promise<ApplyResult> {
  const {
    concurrency = DEFAULT_CONCURRENCY,
    signal,
    onEvent,
    onStateChange,
    generatePassword = defaultGeneratePassword,
    generateSSHKey = defaultGenerateSSHKey
  } = options

  const startTime = Date.now()
  const limit = pLimit(concurrency)
  const { nodes } = graph

  const states: ResourceState[] = nodes.map((): ResourceState => 'pending')
  const completions = nodes.map(() => createDeferred<ResourceOutcome>())
  const outcomes: ResourceOutcome[] = []

  const transition = (index: number, to: ResourceState): void => {
    const from = states[index]
    states[index] = to
    const { kind, identity } = nodes[index]
    onStateChange?.({ kind, identity, from, to })
  }

  const emit = (index: number, event: Omit<ReconcileEvent, 'kind' | 'identity'>): void => {
    const { kind, identity } = nodes[index]
    onEvent?.({ kind, identity, ...event })
  }

  const settle = (index: number, outcome: ResourceOutcome): void => {
    transition(index, outcome.state)
    emit(index, { phase: outcome.state, action: outcome.action, cause: outcome.cause })
    outcomes[index] = outcome
    completions[index].resolve(outcome)
  }

  const fail = (index: number, cause: VaultsmithError, action?: ReconcileAction): void => {
    const { kind, identity } = nodes[index]
    settle(index, { kind, identity, state: 'failed', action, cause })
  }

  // Queued calls still waiting for a slot are dropped once the run is aborted
  const call = <T>(fn: () => Promise<T>): Promise<T> =>
    limit(async () => {
      if (signal?.aborted) {
        throw new CancelledError()
      }
      return fn()
    })

  const awaitDependencies = (index: number): Promise<DependencyGate> =>
    new Promise(resolve => {
      const deps = graph.dependencies[index]
      let remaining = deps.length

      const onAbort = () => done({ type: 'cancelled' })
      const done = (gate: DependencyGate) => {
        signal?.removeEventListener('abort', onAbort)
        resolve(gate)
      }

      if (signal?.aborted) {
        done({ type: 'cancelled' })
        return
      }
      if (remaining === 0) {
        done({ type: 'ready' })
        return
      }

      signal?.addEventListener('abort', onAbort, { once: true })
      for (const dep of deps) {
        void completions[dep].promise.then(outcome => {
          if (outcome.state === 'failed') {
            done(outcome.cause instanceof CancelledError ? { type: 'cancelled' } : { type: 'blocked', dependency: dep })
          } else if (--remaining === 0) {
            done({ type: 'ready' })
          }
        })
      }
    })

  // --------------------------------------------------------------------------
  // Per-kind planning
  // --------------------------------------------------------------------------

  const planSpec = async <K extends ResourceKind>(
    resource: ResourceOfKind<K>,
    ops: SpecOperations<K>
  ): Promise<NodePlan> => {
    const remote = await call(ops.fetch)
    if (!remote) {
      return { action: 'create', execute: () => call(ops.create) }
    }
    if (!remote.snapshot) {
      throw new UnmanagedResourceError(formatRef(resource))
    }

    const diff = diffSpec(resource.kind, resource.spec, remote.snapshot)
    if (diff.immutable.length > 0) {
      throw new ImmutableFieldError(formatRef(resource), diff.immutable)
    }
    if (diff.changed.length === 0) {
      return { action: 'verify', execute: noop }
    }
    return { action: 'update', execute: () => call(() => ops.update(remote)) }
  }

  const fetchPasswordPolicy = async (resource: ResourceOfKind<'Password'>): Promise<PasswordPolicyParams> => {
    const policyPath = normalizePath(resource.spec.policyPath)
    const policy = await call(() => gateway.PasswordPolicy.fetch(policyPath))
    if (!policy?.snapshot) {
      throw new PasswordPolicyNotFoundError(policyPath, formatRef(resource))
    }
    return policy.snapshot.policy
  }

  const planPassword = async (resource: ResourceOfKind<'Password'>): Promise<NodePlan> => {
    const passwords = gateway.Password
    const remote = await call(() => passwords.fetch(resource.identity, resource))
    const action = decideSecretAction(resource, remote)
    if (action === 'verify') {
      return { action, execute: noop }
    }

    return {
      action,
      execute: async () => {
        const value = await generatePassword(await fetchPasswordPolicy(resource))
        const request = { resource, material: { value } }
        return action === 'create'
          ? call(() => passwords.create(request))
          : call(() => passwords.update(resource.identity, { ...request, current: remote ?? undefined }))
      }
    }
  }

  const planSSHKey = async (resource: ResourceOfKind<'SSHKey'>): Promise<NodePlan> => {
    const keys = gateway.SSHKey
    const remote = await call(() => keys.fetch(resource.identity, resource))
    const action = decideSecretAction(resource, remote)
    if (action === 'verify') {
      return { action, execute: noop }
    }

    return {
      action,
      execute: async () => {
        const material = await generateSSHKey(resource.spec.keyOptions)
        const request = { resource, material }
        return action === 'create'
          ? call(() => keys.create(request))
          : call(() => keys.update(resource.identity, { ...request, current: remote ?? undefined }))
      }
    }
  }

  const planNode = (resource: Resource): Promise<NodePlan> => {
    switch (resource.kind) {
      case 'SecretsEngine': {
        const engines = gateway.SecretsEngine
        return planSpec(resource, {
          fetch: () => engines.fetch(resource.identity, resource),
          create: () => engines.create({ resource }),
          update: current => engines.update(resource.identity, { resource, current })
        })
      }
      case 'PasswordPolicy': {
        const policies = gateway.PasswordPolicy
        return planSpec(resource, {
          fetch: () => policies.fetch(resource.identity, resource),
          create: () => policies.create({ resource }),
          update: current => policies.update(resource.identity, { resource, current })
        })
      }
      case 'Issuer': {
        const issuers = gateway.Issuer
        return planSpec(resource, {
          fetch: () => issuers.fetch(resource.identity, resource),
          create: () => issuers.create({ resource }),
          update: current => issuers.update(resource.identity, { resource, current })
        })
      }
      case 'PKIRole': {
        const roles = gateway.PKIRole
        return planSpec(resource, {
          fetch: () => roles.fetch(resource.identity, resource),
          create: () => roles.create({ resource }),
          update: current => roles.update(resource.identity, { resource, current })
        })
      }
      case 'Password':
        return planPassword(resource)
      case 'SSHKey':
        return planSSHKey(resource)
    }
  }

  // --------------------------------------------------------------------------
  // Node task
  // --------------------------------------------------------------------------

  const runNode = async (index: number): Promise<void> => {
    const resource = nodes[index]
    transition(index, 'waiting')

    const gate = await awaitDependencies(index)
    if (gate.type === 'blocked') {
      fail(index, new DependencyBlockedError(formatRef(nodes[gate.dependency])))
      return
    }
    if (gate.type === 'cancelled' || signal?.aborted) {
      fail(index, new CancelledError())
      return
    }

    let action: ReconcileAction | undefined
    try {
      transition(index, 'fetching')
      const plan = await planNode(resource)
      action = plan.action

      transition(index, ACTION_STATES[action])
      emit(index, { phase: 'started', action })

      await plan.execute()
      settle(index, { kind: resource.kind, identity: resource.identity, state: 'succeeded', action })
    } catch (error) {
      fail(index, wrapError(error), action)
    }
  }

  await Promise.all(nodes.map((_, index) => runNode(index)))

  const succeeded = outcomes.filter(outcome => outcome.state === 'succeeded').length
  const failed = outcomes.length - succeeded

  return {
    success: failed === 0,
    total: nodes.length,
    succeeded,
    failed,
    elapsedMs: Date.now() - startTime,
    outcomes
  }
}
