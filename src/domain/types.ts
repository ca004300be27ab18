/**
 * Vaultsmith Domain Types
 *
 * Resource model shared by the manifest parser, the dependency graph and the reconciler:
 * - Resource: closed tagged union over the six Vault resource kinds
 * - ResourceRef: (kind, identity) pair used as graph key and reference target
 * - Reconcile states, actions, events and the apply result
 */

import type { VaultsmithError } from '../lib/errors.js'

// ============================================================================
// Kinds & references
// ============================================================================

export const RESOURCE_KINDS = [
  'SecretsEngine',
  'PasswordPolicy',
  'Issuer',
  'PKIRole',
  'SSHKey',
  'Password'
] as const

export type ResourceKind = typeof RESOURCE_KINDS[number]

/** Kinds whose material is generated locally and gated by `version` */
export type SecretKind = 'Password' | 'SSHKey'

export interface ResourceRef {
  kind: ResourceKind
  identity: string
}

/** Where a resource was declared */
export interface ResourceSource {
  file: string
  /** Zero-based document index within the file */
  document: number
}

export type StringEncoding = 'utf8' | 'base64'

// ============================================================================
// SecretsEngine
// ============================================================================

export interface SecretsEngineTuneConfig {
  defaultLeaseTtl?: string
  maxLeaseTtl?: string
  auditNonHmacRequestKeys?: string[]
  auditNonHmacResponseKeys?: string[]
  listingVisibility?: 'unauth' | 'hidden'
  passthroughRequestHeaders?: string[]
  allowedResponseHeaders?: string[]
}

interface EngineCommonOptions {
  description?: string
  local?: boolean
  sealWrap?: boolean
  externalEntropyAccess?: boolean
  config?: SecretsEngineTuneConfig
}

export interface KvV2EngineOptions extends EngineCommonOptions {
  type: 'kv-v2'
  maxVersions?: number
  casRequired?: boolean
  deleteVersionAfter?: string
}

export interface PkiEngineOptions extends EngineCommonOptions {
  type: 'pki'
}

export type EngineOptions = KvV2EngineOptions | PkiEngineOptions

export interface SecretsEngineSpec {
  path: string
  engine: EngineOptions
}

// ============================================================================
// PasswordPolicy & Password
// ============================================================================

export interface CharsetRule {
  charset: string
  minChars?: number
}

export interface PasswordPolicyParams {
  length: number
  rules: CharsetRule[]
}

export interface PasswordPolicySpec {
  path: string
  policy: PasswordPolicyParams
}

export interface PasswordSpec {
  secretsEnginePath: string
  path: string
  secretKey: string
  policyPath: string
  version: number
  encoding: StringEncoding
}

// ============================================================================
// SSHKey
// ============================================================================

export type RsaKeyBits = 2048 | 3072 | 4096
export type EllipticCurve = 'prime256v1' | 'secp384r1' | 'secp521r1'

export type SSHKeyOptions =
  | { type: 'rsa'; bits?: RsaKeyBits }
  | { type: 'ec'; curve: EllipticCurve }
  | { type: 'ed25519' }

export interface SecretKeyField {
  secretKey?: string
}

export interface SSHKeySpec {
  secretsEnginePath: string
  path: string
  version: number
  encoding: StringEncoding
  keyOptions: SSHKeyOptions
  privateKey?: SecretKeyField
  publicKey?: SecretKeyField
}

// ============================================================================
// PKI
// ============================================================================

export type IssuerType = 'internal' | 'exported' | 'existing' | 'kms'
export type PkiKeyType = 'rsa' | 'ec' | 'ed25519'

export interface IssuerCertificate {
  type: IssuerType
  commonName: string
  altNames?: string
  ipSans?: string
  uriSans?: string
  ttl?: string
  maxPathLength?: number
  keyType?: PkiKeyType
  keyBits?: number
  organization?: string
  ou?: string
  country?: string
  locality?: string
  province?: string
  notAfter?: string
}

export interface IssuerOptions {
  leafNotAfterBehavior?: 'err' | 'truncate' | 'permit'
  usage?: string
  manualChain?: string[]
  revocationSignatureAlgorithm?: string
  issuingCertificates?: string[]
  crlDistributionPoints?: string[]
  ocspServers?: string[]
  enableAiaUrlTemplating?: boolean
}

export interface IssuerChaining {
  /** Full identity of the signing issuer, e.g. "pki/root-2024" */
  upstreamIssuerRef: string
  addBasicConstraints?: boolean
  signatureBits?: number
  skid?: string
  usePss?: boolean
}

export interface IssuerSpec {
  secretsEnginePath: string
  name: string
  certificate: IssuerCertificate
  options?: IssuerOptions
  chaining?: IssuerChaining
}

export interface PKIRoleFields {
  /** Full identity of the issuer that signs for this role */
  issuerRef: string
  ttl?: string
  maxTtl?: string
  allowLocalhost?: boolean
  allowedDomains?: string[]
  allowBareDomains?: boolean
  allowSubdomains?: boolean
  allowGlobDomains?: boolean
  allowWildcardCertificates?: boolean
  allowAnyName?: boolean
  enforceHostnames?: boolean
  allowIpSans?: boolean
  serverFlag?: boolean
  clientFlag?: boolean
  codeSigningFlag?: boolean
  keyType?: PkiKeyType | 'any'
  keyBits?: number
  keyUsage?: string[]
  extKeyUsage?: string[]
  organization?: string[]
  ou?: string[]
  country?: string[]
  noStore?: boolean
  requireCn?: boolean
  notBeforeDuration?: string
}

export interface PKIRoleSpec {
  secretsEnginePath: string
  name: string
  role: PKIRoleFields
}

// ============================================================================
// Resource union
// ============================================================================

export interface SpecByKind {
  SecretsEngine: SecretsEngineSpec
  PasswordPolicy: PasswordPolicySpec
  Issuer: IssuerSpec
  PKIRole: PKIRoleSpec
  SSHKey: SSHKeySpec
  Password: PasswordSpec
}

export type ResourceSpec<K extends ResourceKind = ResourceKind> = SpecByKind[K]

export interface ResourceOfKind<K extends ResourceKind> {
  readonly kind: K
  readonly identity: string
  readonly spec: SpecByKind[K]
  /** Producers this resource references, in declaration order */
  readonly dependsOn: readonly ResourceRef[]
  readonly source?: ResourceSource
}

export type Resource = { [K in ResourceKind]: ResourceOfKind<K> }[ResourceKind]

/** Input to `defineResource`: a kind and its spec */
export type ResourceDeclaration = { [K in ResourceKind]: { kind: K; spec: SpecByKind[K] } }[ResourceKind]

// ============================================================================
// Identity helpers
// ============================================================================

/**
 * Trim leading and trailing slashes and collapse repeated ones
 */
export function normalizePath(path: string): string {
  return path.split('/').filter(Boolean).join('/')
}

export function joinPath(...parts: string[]): string {
  return normalizePath(parts.join('/'))
}

/** Graph key for a (kind, identity) pair */
export function refKey(ref: ResourceRef): string {
  return `${ref.kind}:${ref.identity}`
}

/** Human-readable reference, e.g. "SecretsEngine 'kv'" */
export function formatRef(ref: ResourceRef): string {
  return `${ref.kind} '${ref.identity}'`
}

export function isSecretKind(kind: ResourceKind): kind is SecretKind {
  return kind === 'Password' || kind === 'SSHKey'
}

function build<K extends ResourceKind>(
  kind: K,
  spec: SpecByKind[K],
  identity: string,
  dependsOn: ResourceRef[],
  source?: ResourceSource
): ResourceOfKind<K> {
  return { kind, identity, spec, dependsOn, source }
}

function engineRef(secretsEnginePath: string): ResourceRef {
  return { kind: 'SecretsEngine', identity: normalizePath(secretsEnginePath) }
}

/**
 * Build a Resource from its declaration: computes the identity and the ordered
 * list of references.
 */
export function defineResource(declaration: ResourceDeclaration, source?: ResourceSource): Resource {
  switch (declaration.kind) {
    case 'SecretsEngine':
      return build(declaration.kind, declaration.spec, normalizePath(declaration.spec.path), [], source)

    case 'PasswordPolicy':
      return build(declaration.kind, declaration.spec, normalizePath(declaration.spec.path), [], source)

    case 'Issuer': {
      const { spec } = declaration
      const refs = [engineRef(spec.secretsEnginePath)]
      if (spec.chaining) {
        refs.push({ kind: 'Issuer', identity: normalizePath(spec.chaining.upstreamIssuerRef) })
      }
      return build(declaration.kind, spec, joinPath(spec.secretsEnginePath, spec.name), refs, source)
    }

    case 'PKIRole': {
      const { spec } = declaration
      return build(declaration.kind, spec, joinPath(spec.secretsEnginePath, spec.name), [
        engineRef(spec.secretsEnginePath),
        { kind: 'Issuer', identity: normalizePath(spec.role.issuerRef) }
      ], source)
    }

    case 'SSHKey': {
      const { spec } = declaration
      return build(declaration.kind, spec, joinPath(spec.secretsEnginePath, spec.path), [
        engineRef(spec.secretsEnginePath)
      ], source)
    }

    case 'Password': {
      const { spec } = declaration
      return build(declaration.kind, spec, joinPath(spec.secretsEnginePath, spec.path), [
        engineRef(spec.secretsEnginePath),
        { kind: 'PasswordPolicy', identity: normalizePath(spec.policyPath) }
      ], source)
    }
  }
}

// ============================================================================
// Reconciliation
// ============================================================================

export type ReconcileAction = 'create' | 'update' | 'verify' | 'regenerate'

export type ResourceState =
  | 'pending'
  | 'waiting'
  | 'fetching'
  | 'creating'
  | 'updating'
  | 'verifying'
  | 'regenerating'
  | 'succeeded'
  | 'failed'

export type TerminalState = 'succeeded' | 'failed'

export const ACTION_STATES: Record<ReconcileAction, ResourceState> = {
  create: 'creating',
  update: 'updating',
  verify: 'verifying',
  regenerate: 'regenerating'
}

export type EventPhase = 'started' | 'succeeded' | 'failed'

export interface ReconcileEvent {
  phase: EventPhase
  kind: ResourceKind
  identity: string
  /** Chosen action; absent for failures before an action was chosen */
  action?: ReconcileAction
  cause?: VaultsmithError
}

export interface StateChange {
  kind: ResourceKind
  identity: string
  from: ResourceState
  to: ResourceState
}

export interface ResourceOutcome {
  kind: ResourceKind
  identity: string
  state: TerminalState
  action?: ReconcileAction
  cause?: VaultsmithError
}

export interface ApplySummary {
  total: number
  succeeded: number
  failed: number
  elapsedMs: number
}

export interface ApplyResult extends ApplySummary {
  success: boolean
  outcomes: ResourceOutcome[]
}

export function emptyApplySummary(): ApplySummary {
  return { total: 0, succeeded: 0, failed: 0, elapsedMs: 0 }
}
