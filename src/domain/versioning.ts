/**
 * Versioned Secret Policy
 *
 * Generated secrets (Password, SSHKey) are only ever rewritten when their
 * declared `version` moves past the version recorded in Vault.
 */

import { UnmanagedResourceError, VersionDowngradeError } from '../lib/errors.js'
import type { RemoteState } from '../gateway/types.js'
import { formatRef, type ResourceOfKind, type SecretKind } from './types.js'

export type SecretAction = 'create' | 'regenerate' | 'verify'

/**
 * Decide what to do with a generated secret.
 *
 * - absent remotely: create
 * - declared version above the recorded one: regenerate
 * - same version: verify, whatever else changed in the spec
 * - declared version below the recorded one: VersionDowngradeError
 */
export function decideSecretAction<K extends SecretKind>(
  resource: ResourceOfKind<K>,
  remote: RemoteState<K> | null
): SecretAction {
  if (!remote) {
    return 'create'
  }
  if (!remote.snapshot) {
    throw new UnmanagedResourceError(formatRef(resource))
  }

  const desired = resource.spec.version
  const recorded = remote.snapshot.version

  if (desired > recorded) return 'regenerate'
  if (desired === recorded) return 'verify'
  throw new VersionDowngradeError(formatRef(resource), desired, recorded)
}
