/**
 * Vaultsmith - Declarative reconciliation for HashiCorp Vault
 *
 * Main library exports for programmatic usage
 */

// Client
export { VaultClient, createClient, reasonForStatus } from './client.js'
export type { VaultResponse } from './client.js'

// Types
export type {
  AuthConfig,
  TokenAuthConfig,
  KubernetesAuthConfig,
  StorageConfig,
  VaultsmithConfig,
  VaultClientOptions,
  RequestTrace,
  FetchLike,
  FetchInit,
  FetchResponse
} from './types.js'

export { DEFAULT_STORAGE, DEFAULT_KUBERNETES_JWT_PATH } from './types.js'

// Config utilities
export { loadConfig, findConfigDir, configExists, expandEnvVars } from './lib/config-loader.js'
export type { LoadConfigOptions } from './lib/config-loader.js'

// Manifests
export { loadManifests, findManifests } from './lib/manifest-loader.js'
export type { LoadManifestsOptions } from './lib/manifest-loader.js'

// Gateway
export { VaultGateway, SNAPSHOT_METADATA_KEY } from './gateway/vault.js'
export type { VaultGatewayOptions } from './gateway/vault.js'
export { renderPasswordPolicy, parsePasswordPolicy } from './gateway/password-policy-hcl.js'
export type {
  RemoteState,
  RemoteStateGateway,
  KindGateway,
  WriteRequest,
  PasswordMaterial,
  SSHKeyMaterial
} from './gateway/types.js'

// Secret material
export { generatePassword } from './lib/password-generator.js'
export { generateSSHKey } from './lib/ssh-keygen.js'

// Errors
export {
  VaultsmithError,
  ConfigError,
  ManifestError,
  GatewayError,
  PolicyViolationError,
  RunError,
  NoManifestsError,
  ManifestParseError,
  DuplicateResourceError,
  DependencyCycleError,
  UnresolvedReferenceError,
  VersionDowngradeError,
  ImmutableFieldError,
  UnmanagedResourceError,
  PasswordPolicyNotFoundError,
  DependencyBlockedError,
  CancelledError,
  isVaultsmithError,
  isGatewayError,
  formatErrorForCli
} from './lib/errors.js'
export type { GatewayErrorReason } from './lib/errors.js'

// Domain
export * from './domain/index.js'
