/**
 * Vault-backed Remote State Gateway
 *
 * Maps each resource kind onto the Vault HTTP API:
 * - SecretsEngine: sys/mounts, tune and KV config read back for drift
 * - PasswordPolicy: sys/policies/password (the live policy is its own snapshot)
 * - Issuer, PKIRole: the pki engine, snapshots kept by the SnapshotStore
 * - Password, SSHKey: KV v2 secrets, snapshot in custom metadata
 */

import { z } from 'zod'
import type { VaultClient, VaultResponse } from '../client.js'
import {
  IssuerSpecSchema,
  PasswordSpecSchema,
  PKIRoleSpecSchema,
  SecretsEngineSpecSchema,
  SSHKeySpecSchema
} from '../domain/manifest.js'
import type {
  IssuerChaining,
  IssuerSpec,
  KvV2EngineOptions,
  PKIRoleSpec,
  ResourceKind,
  ResourceOfKind,
  SecretKind,
  SecretsEngineSpec,
  SpecByKind
} from '../domain/types.js'
import { toSnakeKeys } from '../lib/case.js'
import { encodeValue } from '../lib/encoding.js'
import { GatewayError, isGatewayError } from '../lib/errors.js'
import { DEFAULT_STORAGE, type StorageConfig } from '../types.js'
import { liveChanges } from './live-state.js'
import { parsePasswordPolicy, PasswordPolicySyntaxError, renderPasswordPolicy } from './password-policy-hcl.js'
import { splitMount, vaultPath } from './paths.js'
import { SnapshotStore, type MountInfo } from './snapshot-store.js'
import type { KindGateway, RemoteState, RemoteStateGateway } from './types.js'

export const SNAPSHOT_METADATA_KEY = 'vaultsmith.dev/snapshot'

export const DEFAULT_SSH_PRIVATE_KEY = 'private_key'
export const DEFAULT_SSH_PUBLIC_KEY = 'public_key'

// Error texts Vault uses for objects that do not exist
const SYSVIEW_FETCH_ERROR = 'cannot fetch sysview for path'
const ISSUER_NOT_FOUND = 'unable to find PKI issuer for reference'

const mountListSchema = z.record(z.object({
  type: z.string(),
  options: z.record(z.string()).nullable().optional()
}).passthrough())

const secretMetadataSchema = z.object({
  current_version: z.number(),
  custom_metadata: z.record(z.string()).nullable().optional()
}).passthrough()

const secretDataSchema = z.object({
  data: z.record(z.unknown()).nullable()
}).passthrough()

const secretWriteSchema = z.object({ version: z.number() }).passthrough()

export interface VaultGatewayOptions {
  storage?: StorageConfig
}

type LiveData = Record<string, unknown>

interface MountPath {
  mount: string
  path: string
}

function hasMessage(error: unknown, text: string): boolean {
  return isGatewayError(error) && error.message.includes(text)
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

export class VaultGateway implements RemoteStateGateway {
  private readonly snapshots: SnapshotStore
  private mounts: Promise<Map<string, MountInfo>> | null = null

  constructor(private readonly client: VaultClient, options: VaultGatewayOptions = {}) {
    this.snapshots = new SnapshotStore(client, options.storage ?? DEFAULT_STORAGE)
  }

  /**
   * Enable the snapshot storage engine when missing. Call once before the first write.
   */
  async prepare(): Promise<void> {
    const mounts = await this.listMounts()
    if (await this.snapshots.prepare(mounts)) {
      mounts.set(this.snapshots.mountPath, { type: 'kv', version: '1' })
    }
  }

  // ==========================================================================
  // Kind gateways
  // ==========================================================================

  readonly SecretsEngine: KindGateway<'SecretsEngine'> = {
    fetch: (identity, desired) => {
      const spec = desired?.spec
      return this.fetchSnapshotted(
        'SecretsEngine',
        identity,
        SecretsEngineSpecSchema,
        () => this.readTune(identity),
        spec && ((snapshot, tune) => this.withLiveEngine(snapshot, spec, tune))
      )
    },
    create: async ({ resource }) => {
      await this.enableSecretsEngine(resource.spec)
      return this.recordSnapshot(resource)
    },
    update: async (_identity, { resource }) => {
      await this.tuneSecretsEngine(resource.spec)
      return this.recordSnapshot(resource)
    }
  }

  readonly PasswordPolicy: KindGateway<'PasswordPolicy'> = {
    fetch: async identity => {
      const response = await this.client.read(vaultPath('sys/policies/password', identity))
      if (!response) return null

      const source = response.data?.policy
      let snapshot: SpecByKind['PasswordPolicy'] | null = null
      if (typeof source === 'string') {
        try {
          snapshot = { path: identity, policy: parsePasswordPolicy(source) }
        } catch (error) {
          if (!(error instanceof PasswordPolicySyntaxError)) throw error
        }
      }
      return { kind: 'PasswordPolicy', identity, snapshot }
    },
    create: ({ resource }) => this.writePasswordPolicy(resource),
    update: (_identity, { resource }) => this.writePasswordPolicy(resource)
  }

  readonly Issuer: KindGateway<'Issuer'> = {
    fetch: async (identity, desired) => {
      const spec = desired?.spec
      const location = spec
        ? { mount: spec.secretsEnginePath, path: spec.name }
        : await this.locate(identity)
      return this.fetchSnapshotted(
        'Issuer',
        identity,
        IssuerSpecSchema,
        () => this.readIssuer(location),
        spec && ((snapshot, issuer) => this.withLiveIssuer(snapshot, spec, issuer))
      )
    },
    create: async ({ resource }) => {
      if (resource.spec.chaining) {
        await this.createIntermediateIssuer(resource.spec, resource.spec.chaining)
      } else {
        await this.createRootIssuer(resource.spec)
      }
      return this.recordSnapshot(resource)
    },
    update: async (_identity, { resource }) => {
      const { spec } = resource
      await this.client.write(vaultPath(spec.secretsEnginePath, 'issuer', spec.name), toSnakeKeys(spec.options ?? {}))
      return this.recordSnapshot(resource)
    }
  }

  readonly PKIRole: KindGateway<'PKIRole'> = {
    fetch: async (identity, desired) => {
      const spec = desired?.spec
      const location = spec
        ? { mount: spec.secretsEnginePath, path: spec.name }
        : await this.locate(identity)
      return this.fetchSnapshotted(
        'PKIRole',
        identity,
        PKIRoleSpecSchema,
        async () => (await this.client.read(vaultPath(location.mount, 'roles', location.path)))?.data ?? null,
        spec && ((snapshot, role) => this.withLiveRole(snapshot, spec, role))
      )
    },
    create: ({ resource }) => this.writePKIRole(resource),
    update: (_identity, { resource }) => this.writePKIRole(resource)
  }

  readonly Password: KindGateway<'Password'> = {
    fetch: async (identity, desired) => this.fetchSecret('Password', identity, PasswordSpecSchema, desired
      ? { mount: desired.spec.secretsEnginePath, path: desired.spec.path }
      : await this.locate(identity)),
    create: ({ resource, material }) => this.writeSecret(resource, {
      [resource.spec.secretKey]: encodeValue(material.value, resource.spec.encoding)
    }),
    update: (_identity, { resource, material, current }) => this.writeSecret(resource, {
      [resource.spec.secretKey]: encodeValue(material.value, resource.spec.encoding)
    }, current)
  }

  readonly SSHKey: KindGateway<'SSHKey'> = {
    fetch: async (identity, desired) => this.fetchSecret('SSHKey', identity, SSHKeySpecSchema, desired
      ? { mount: desired.spec.secretsEnginePath, path: desired.spec.path }
      : await this.locate(identity)),
    create: ({ resource, material }) => this.writeSecret(resource, this.sshKeyValues(resource, material)),
    update: (_identity, { resource, material, current }) =>
      this.writeSecret(resource, this.sshKeyValues(resource, material), current)
  }

  // ==========================================================================
  // Mounts
  // ==========================================================================

  private listMounts(): Promise<Map<string, MountInfo>> {
    if (!this.mounts) {
      this.mounts = this.loadMounts().catch(error => {
        this.mounts = null
        throw error
      })
    }
    return this.mounts
  }

  private async loadMounts(): Promise<Map<string, MountInfo>> {
    const response = await this.client.read('sys/mounts')
    const parsed = mountListSchema.safeParse(response?.data ?? {})
    if (!parsed.success) {
      throw new GatewayError('GET sys/mounts: unexpected response body', 'unknown')
    }

    const mounts = new Map<string, MountInfo>()
    for (const [path, mount] of Object.entries(parsed.data)) {
      mounts.set(path.replace(/\/+$/, ''), { type: mount.type, version: mount.options?.version })
    }
    return mounts
  }

  /** Split an identity into engine mount and path using the live mount table */
  private async locate(identity: string): Promise<MountPath> {
    const mounts = await this.listMounts()
    return splitMount(identity, mounts.keys())
  }

  private async rememberMount(path: string, info: MountInfo): Promise<void> {
    const mounts = await this.listMounts()
    mounts.set(path, info)
  }

  // ==========================================================================
  // Snapshots
  // ==========================================================================

  /**
   * Read the live object and its recorded snapshot. With `withLive`, fields the
   * manifest declares are replaced by what Vault reports, so changes made
   * outside vaultsmith surface as differences.
   */
  private async fetchSnapshotted<K extends ResourceKind>(
    kind: K,
    identity: string,
    schema: z.ZodType<SpecByKind[K], z.ZodTypeDef, unknown>,
    readLive: () => Promise<LiveData | null>,
    withLive?: (snapshot: SpecByKind[K], live: LiveData) => Promise<SpecByKind[K]>
  ): Promise<RemoteState<K> | null> {
    const live = await readLive()
    if (!live) {
      return null
    }
    const recorded = await this.snapshots.get(kind, identity, schema)
    const snapshot = recorded && withLive ? await withLive(recorded, live) : recorded
    return { kind, identity, snapshot }
  }

  // Revalidated so an overlaid snapshot keeps its type; unusable live values keep the recorded one
  private overlay<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, recorded: T, candidate: unknown): T {
    const parsed = schema.safeParse(candidate)
    return parsed.success ? parsed.data : recorded
  }

  private async recordSnapshot<K extends ResourceKind>(resource: ResourceOfKind<K>): Promise<RemoteState<K>> {
    await this.snapshots.put(resource.kind, resource.identity, resource.spec)
    return { kind: resource.kind, identity: resource.identity, snapshot: resource.spec }
  }

  // ==========================================================================
  // SecretsEngine
  // ==========================================================================

  private async readTune(path: string): Promise<LiveData | null> {
    try {
      return (await this.client.read(vaultPath('sys/mounts', path, 'tune')))?.data ?? null
    } catch (error) {
      if (hasMessage(error, SYSVIEW_FETCH_ERROR)) {
        return null
      }
      throw error
    }
  }

  private async withLiveEngine(snapshot: SecretsEngineSpec, desired: SecretsEngineSpec, tune: LiveData): Promise<SecretsEngineSpec> {
    const { engine } = desired
    const declared: Record<string, unknown> = { description: engine.description }
    let live: LiveData = tune

    if (engine.type === 'kv-v2') {
      const kvFields = {
        maxVersions: engine.maxVersions,
        casRequired: engine.casRequired,
        deleteVersionAfter: engine.deleteVersionAfter
      }
      if (Object.values(kvFields).some(value => value !== undefined)) {
        const config = await this.client.read(vaultPath(desired.path, 'config'))
        live = { ...tune, ...(config?.data ?? {}) }
        Object.assign(declared, kvFields)
      }
    }

    const recorded = snapshot.engine
    const overlaid: Record<string, unknown> = { ...recorded, ...liveChanges(recorded, declared, live) }
    if (engine.config && recorded.config) {
      overlaid.config = { ...recorded.config, ...liveChanges(recorded.config, engine.config, tune) }
    }
    return this.overlay(SecretsEngineSpecSchema, snapshot, { ...snapshot, engine: overlaid })
  }

  private async enableSecretsEngine(spec: SecretsEngineSpec): Promise<void> {
    const { engine } = spec
    const type = engine.type === 'kv-v2' ? 'kv' : 'pki'
    const options = engine.type === 'kv-v2' ? { version: '2' } : undefined

    await this.client.write(vaultPath('sys/mounts', spec.path), {
      type,
      description: engine.description,
      local: engine.local,
      seal_wrap: engine.sealWrap,
      external_entropy_access: engine.externalEntropyAccess,
      config: engine.config ? toSnakeKeys(engine.config) : undefined,
      options
    })
    await this.rememberMount(spec.path, { type, version: options?.version })

    if (engine.type === 'kv-v2') {
      await this.configureKv(spec.path, engine)
    }
  }

  private async tuneSecretsEngine(spec: SecretsEngineSpec): Promise<void> {
    const { engine } = spec
    await this.client.write(vaultPath('sys/mounts', spec.path, 'tune'), {
      description: engine.description,
      ...toSnakeKeys(engine.config ?? {})
    })

    if (engine.type === 'kv-v2') {
      await this.configureKv(spec.path, engine)
    }
  }

  private async configureKv(path: string, engine: KvV2EngineOptions): Promise<void> {
    const config = toSnakeKeys({
      maxVersions: engine.maxVersions,
      casRequired: engine.casRequired,
      deleteVersionAfter: engine.deleteVersionAfter
    })
    if (Object.keys(config).length > 0) {
      await this.client.write(vaultPath(path, 'config'), config)
    }
  }

  // ==========================================================================
  // PasswordPolicy
  // ==========================================================================

  private async writePasswordPolicy(resource: ResourceOfKind<'PasswordPolicy'>): Promise<RemoteState<'PasswordPolicy'>> {
    await this.client.write(vaultPath('sys/policies/password', resource.identity), {
      policy: renderPasswordPolicy(resource.spec.policy)
    })
    return { kind: 'PasswordPolicy', identity: resource.identity, snapshot: resource.spec }
  }

  // ==========================================================================
  // PKI
  // ==========================================================================

  private async readIssuer({ mount, path }: MountPath): Promise<LiveData | null> {
    try {
      return (await this.client.read(vaultPath(mount, 'issuer', path)))?.data ?? null
    } catch (error) {
      if (hasMessage(error, ISSUER_NOT_FOUND)) {
        return null
      }
      throw error
    }
  }

  private async withLiveIssuer(snapshot: IssuerSpec, desired: IssuerSpec, issuer: LiveData): Promise<IssuerSpec> {
    if (!desired.options || !snapshot.options) {
      return snapshot
    }
    const options = { ...snapshot.options, ...liveChanges(snapshot.options, desired.options, issuer) }
    return this.overlay(IssuerSpecSchema, snapshot, { ...snapshot, options })
  }

  private certificateFields(spec: IssuerSpec): Record<string, unknown> {
    const { type: _type, ...fields } = spec.certificate
    return toSnakeKeys(fields)
  }

  private async createRootIssuer(spec: IssuerSpec): Promise<void> {
    await this.client.write(
      vaultPath(spec.secretsEnginePath, 'issuers/generate/root', spec.certificate.type),
      { ...this.certificateFields(spec), issuer_name: spec.name }
    )

    if (spec.options) {
      await this.client.write(vaultPath(spec.secretsEnginePath, 'issuer', spec.name), toSnakeKeys(spec.options))
    }
  }

  /**
   * Generate a CSR on this engine, have the upstream issuer sign it, import the
   * certificate and name the imported issuer.
   */
  private async createIntermediateIssuer(spec: IssuerSpec, chaining: IssuerChaining): Promise<void> {
    const upstream = await this.locate(chaining.upstreamIssuerRef)

    const csrResponse = await this.client.write(
      vaultPath(spec.secretsEnginePath, 'issuers/generate/intermediate', spec.certificate.type),
      { ...this.certificateFields(spec), add_basic_constraints: chaining.addBasicConstraints ?? false }
    )
    const csr = this.requireString(csrResponse, 'csr', 'generate intermediate CSR')

    const { upstreamIssuerRef: _ref, addBasicConstraints: _constraints, ...signOptions } = chaining
    const signed = await this.client.write(vaultPath(upstream.mount, 'issuer', upstream.path, 'sign-intermediate'), {
      ...toSnakeKeys(signOptions),
      csr,
      common_name: spec.certificate.commonName,
      ttl: spec.certificate.ttl,
      use_csr_values: true
    })
    const certificate = this.requireString(signed, 'certificate', 'sign intermediate certificate')

    const imported = await this.client.write(vaultPath(spec.secretsEnginePath, 'intermediate/set-signed'), { certificate })
    const issuers = z.array(z.string()).safeParse(imported?.data?.imported_issuers)
    if (!issuers.success || issuers.data.length !== 1) {
      throw new GatewayError(
        `Expected exactly one imported issuer for ${spec.secretsEnginePath}/${spec.name}`,
        'unknown',
        { context: { imported: imported?.data?.imported_issuers } }
      )
    }

    await this.client.write(vaultPath(spec.secretsEnginePath, 'issuer', issuers.data[0]), {
      ...toSnakeKeys(spec.options ?? {}),
      issuer_name: spec.name
    })
  }

  private requireString(response: VaultResponse | null, field: string, operation: string): string {
    const value = response?.data?.[field]
    if (typeof value !== 'string') {
      throw new GatewayError(`Failed to ${operation}: response has no ${field}`, 'unknown')
    }
    return value
  }

  private async withLiveRole(snapshot: PKIRoleSpec, desired: PKIRoleSpec, role: LiveData): Promise<PKIRoleSpec> {
    // Vault keeps the issuer reference relative to the mount
    const issuerRef = role.issuer_ref
    const live = typeof issuerRef === 'string'
      ? { ...role, issuer_ref: `${desired.secretsEnginePath}/${issuerRef}` }
      : role
    const fields = { ...snapshot.role, ...liveChanges(snapshot.role, desired.role, live) }
    return this.overlay(PKIRoleSpecSchema, snapshot, { ...snapshot, role: fields })
  }

  private async writePKIRole(resource: ResourceOfKind<'PKIRole'>): Promise<RemoteState<'PKIRole'>> {
    const { secretsEnginePath, name, role } = resource.spec
    const { issuerRef, ...fields } = role

    if (!issuerRef.startsWith(`${secretsEnginePath}/`)) {
      throw new GatewayError(
        `Issuer '${issuerRef}' must belong to the secrets engine '${secretsEnginePath}' of role '${name}'`,
        'invalid'
      )
    }

    await this.client.write(vaultPath(secretsEnginePath, 'roles', name), {
      ...toSnakeKeys(fields),
      issuer_ref: issuerRef.slice(secretsEnginePath.length + 1)
    })
    return this.recordSnapshot(resource)
  }

  // ==========================================================================
  // Secrets (KV v2)
  // ==========================================================================

  private secretLocation(resource: ResourceOfKind<SecretKind>): MountPath {
    return { mount: resource.spec.secretsEnginePath, path: resource.spec.path }
  }

  private async readCustomMetadata({ mount, path }: MountPath): Promise<{ version: number; custom: Record<string, string> } | null> {
    const response = await this.client.read(vaultPath(mount, 'metadata', path))
    if (!response) return null

    const parsed = secretMetadataSchema.safeParse(response.data)
    if (!parsed.success) {
      throw new GatewayError(`GET ${mount}/metadata/${path}: unexpected response body`, 'unknown')
    }
    return { version: parsed.data.current_version, custom: parsed.data.custom_metadata ?? {} }
  }

  private async fetchSecret<K extends SecretKind>(
    kind: K,
    identity: string,
    schema: z.ZodType<SpecByKind[K], z.ZodTypeDef, unknown>,
    location: MountPath
  ): Promise<RemoteState<K> | null> {
    const metadata = await this.readCustomMetadata(location)
    if (!metadata) return null

    const raw = metadata.custom[SNAPSHOT_METADATA_KEY]
    const parsed = raw === undefined ? null : schema.safeParse(parseJson(raw))
    return {
      kind,
      identity,
      snapshot: parsed?.success ? parsed.data : null,
      revision: metadata.version
    }
  }

  /**
   * Write secret values with check-and-set. On regeneration the other keys of
   * the secret and unrelated custom metadata are kept.
   */
  private async writeSecret<K extends SecretKind>(
    resource: ResourceOfKind<K>,
    values: Record<string, string>,
    current?: RemoteState<K>
  ): Promise<RemoteState<K>> {
    const location = this.secretLocation(resource)
    const dataPath = vaultPath(location.mount, 'data', location.path)

    let data: Record<string, unknown> = values
    let custom: Record<string, string> = {}
    let cas = 0

    if (current) {
      const existing = secretDataSchema.safeParse((await this.client.read(dataPath))?.data)
      data = { ...(existing.success ? existing.data.data : {}), ...values }
      custom = (await this.readCustomMetadata(location))?.custom ?? {}
      cas = current.revision ?? 0
    }

    const written = await this.client.write(dataPath, { options: { cas }, data })
    const result = secretWriteSchema.safeParse(written?.data)

    await this.client.write(vaultPath(location.mount, 'metadata', location.path), {
      custom_metadata: { ...custom, [SNAPSHOT_METADATA_KEY]: JSON.stringify(resource.spec) }
    })

    return {
      kind: resource.kind,
      identity: resource.identity,
      snapshot: resource.spec,
      revision: result.success ? result.data.version : undefined
    }
  }

  private sshKeyValues(
    resource: ResourceOfKind<'SSHKey'>,
    material: { privateKey: string; publicKey: string }
  ): Record<string, string> {
    const { spec } = resource
    return {
      [spec.privateKey?.secretKey ?? DEFAULT_SSH_PRIVATE_KEY]: encodeValue(material.privateKey, spec.encoding),
      [spec.publicKey?.secretKey ?? DEFAULT_SSH_PUBLIC_KEY]: encodeValue(material.publicKey, spec.encoding)
    }
  }
}
