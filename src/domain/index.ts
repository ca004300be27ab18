/**
 * Vaultsmith Domain Layer
 *
 * - types: resource model, reconcile states and outcomes
 * - manifest: YAML manifest schemas and parser
 * - graph: dependency graph builder
 * - apply: the reconciler
 */

export type {
  ResourceKind,
  SecretKind,
  ResourceRef,
  ResourceSource,
  StringEncoding,
  SecretsEngineSpec,
  SecretsEngineTuneConfig,
  EngineOptions,
  KvV2EngineOptions,
  PkiEngineOptions,
  CharsetRule,
  PasswordPolicyParams,
  PasswordPolicySpec,
  PasswordSpec,
  SSHKeyOptions,
  SSHKeySpec,
  SecretKeyField,
  IssuerSpec,
  IssuerCertificate,
  IssuerOptions,
  IssuerChaining,
  PKIRoleSpec,
  PKIRoleFields,
  SpecByKind,
  ResourceSpec,
  ResourceOfKind,
  Resource,
  ResourceDeclaration,
  ReconcileAction,
  ResourceState,
  TerminalState,
  EventPhase,
  ReconcileEvent,
  StateChange,
  ResourceOutcome,
  ApplySummary,
  ApplyResult
} from './types.js'

export {
  RESOURCE_KINDS,
  ACTION_STATES,
  normalizePath,
  joinPath,
  refKey,
  formatRef,
  isSecretKind,
  defineResource,
  emptyApplySummary
} from './types.js'

export {
  ManifestDocumentSchema,
  SecretsEngineSpecSchema,
  PasswordPolicySpecSchema,
  PasswordSpecSchema,
  SSHKeySpecSchema,
  IssuerSpecSchema,
  PKIRoleSpecSchema,
  parseManifest
} from './manifest.js'
export type { ManifestDocument } from './manifest.js'

export { buildDependencyGraph, resolveExternalReferences } from './graph.js'
export type { DependencyGraph, ExternalReference, ResolveOptions } from './graph.js'

export { diffSpec, IMMUTABLE_FIELDS } from './diff.js'
export type { SpecDiff } from './diff.js'

export { decideSecretAction } from './versioning.js'

export { reconcile, DEFAULT_CONCURRENCY } from './apply.js'
export type { ReconcileOptions } from './apply.js'
