/**
 * Snapshot store
 *
 * Keeps the last-applied spec of SecretsEngine, Issuer and PKIRole resources in
 * a KV v1 engine, one secret per resource at `<snapshotsPath>/<kind>/<identity>`.
 * Secrets (Password, SSHKey) carry their snapshot in KV v2 custom metadata
 * instead.
 */

import type { z } from 'zod'
import type { VaultClient } from '../client.js'
import type { ResourceKind } from '../domain/types.js'
import type { StorageConfig } from '../types.js'
import { GatewayError } from '../lib/errors.js'
import { vaultPath } from './paths.js'

export interface MountInfo {
  type: string
  /** KV version for kv mounts */
  version?: string
}

export class SnapshotStore {
  constructor(
    private readonly client: VaultClient,
    private readonly storage: StorageConfig
  ) {}

  get mountPath(): string {
    return this.storage.secretsEnginePath
  }

  private location(kind: ResourceKind, identity: string): string {
    return vaultPath(this.storage.secretsEnginePath, this.storage.snapshotsPath, kind, identity)
  }

  /**
   * Enable the KV v1 engine holding snapshots when it is missing.
   *
   * @throws GatewayError when the path is taken by another engine type
   */
  async prepare(mounts: ReadonlyMap<string, MountInfo>): Promise<boolean> {
    const existing = mounts.get(this.storage.secretsEnginePath)

    if (!existing) {
      await this.client.write(vaultPath('sys/mounts', this.storage.secretsEnginePath), {
        type: 'kv',
        description: 'vaultsmith applied-state snapshots',
        options: { version: '1' }
      })
      return true
    }

    if (existing.type !== 'kv' || (existing.version !== undefined && existing.version !== '1')) {
      throw new GatewayError(
        `Snapshot storage '${this.storage.secretsEnginePath}' must be a KV v1 engine, found ${existing.type}${existing.version ? ` v${existing.version}` : ''}`,
        'invalid',
        { context: { path: this.storage.secretsEnginePath } }
      )
    }
    return false
  }

  /**
   * Read and validate a snapshot. Resolves null when none is stored or when the
   * stored one no longer matches the schema.
   */
  async get<T>(kind: ResourceKind, identity: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const response = await this.client.read(this.location(kind, identity))
    const parsed = schema.safeParse(response?.data?.spec)
    return parsed.success ? parsed.data : null
  }

  async put(kind: ResourceKind, identity: string, spec: object): Promise<void> {
    await this.client.write(this.location(kind, identity), {
      kind,
      spec,
      appliedAt: new Date().toISOString()
    })
  }
}
