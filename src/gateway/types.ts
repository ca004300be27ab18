/**
 * Remote State Gateway contract
 *
 * The reconciler reads and writes Vault exclusively through this interface.
 * Implementations throw GatewayError for every remote failure.
 */

import type { ResourceKind, ResourceOfKind, SpecByKind } from '../domain/types.js'

export type { GatewayErrorReason } from '../lib/errors.js'
export { GatewayError, isGatewayError } from '../lib/errors.js'

export interface RemoteState<K extends ResourceKind> {
  kind: K
  identity: string
  /** Last-applied spec recorded with the object; null when the object carries none */
  snapshot: SpecByKind[K] | null
  /** Revision of the remote object when the backend versions it (KV v2 current_version) */
  revision?: number
}

export interface PasswordMaterial {
  value: string
}

export interface SSHKeyMaterial {
  /** PKCS#8 PEM */
  privateKey: string
  /** OpenSSH authorized_keys line */
  publicKey: string
}

interface WriteBase<K extends ResourceKind> {
  resource: ResourceOfKind<K>
  /** State returned by the preceding fetch, set on update */
  current?: RemoteState<K>
}

export interface WriteRequestByKind {
  SecretsEngine: WriteBase<'SecretsEngine'>
  PasswordPolicy: WriteBase<'PasswordPolicy'>
  Issuer: WriteBase<'Issuer'>
  PKIRole: WriteBase<'PKIRole'>
  SSHKey: WriteBase<'SSHKey'> & { material: SSHKeyMaterial }
  Password: WriteBase<'Password'> & { material: PasswordMaterial }
}

export type WriteRequest<K extends ResourceKind> = WriteRequestByKind[K]

export interface KindGateway<K extends ResourceKind> {
  /**
   * Read the remote object. Resolves null when it does not exist.
   * `desired` is passed when the resource is declared in the manifest.
   */
  fetch(identity: string, desired?: ResourceOfKind<K>): Promise<RemoteState<K> | null>
  create(request: WriteRequest<K>): Promise<RemoteState<K>>
  update(identity: string, request: WriteRequest<K>): Promise<RemoteState<K>>
}

export type RemoteStateGateway = { [K in ResourceKind]: KindGateway<K> }
