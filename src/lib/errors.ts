/**
 * Vaultsmith Error Hierarchy
 *
 * Typed error classes shared by the engine, the Vault gateway and the CLI.
 *
 * Hierarchy:
 *   VaultsmithError (base)
 *   ├── ConfigError (configuration issues)
 *   │   ├── ConfigNotFoundError
 *   │   ├── InvalidConfigError
 *   │   ├── CircularExtendsError
 *   │   └── ExtendsDepthError
 *   ├── ManifestError (aborts the run before any write)
 *   │   ├── NoManifestsError
 *   │   ├── ManifestParseError
 *   │   ├── DuplicateResourceError
 *   │   ├── DependencyCycleError
 *   │   └── UnresolvedReferenceError
 *   ├── GatewayError (remote store failures, reason-tagged)
 *   ├── PolicyViolationError (terminal for one resource)
 *   │   ├── VersionDowngradeError
 *   │   ├── ImmutableFieldError
 *   │   ├── UnmanagedResourceError
 *   │   └── PasswordPolicyNotFoundError
 *   └── RunError (scheduling outcomes)
 *       ├── DependencyBlockedError
 *       └── CancelledError
 */

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/**
 * Base error class for all Vaultsmith errors
 */
export class VaultsmithError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'VaultsmithError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends VaultsmithError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when an explicitly requested config file does not exist
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath: string) {
    super(`Config file not found: ${searchedPath}`, 'CONFIG_NOT_FOUND', {
      suggestion: 'Create .vaultsmith/config.yaml or pass --config <path>',
      context: { searchedPath }
    })
    this.name = 'ConfigNotFoundError'
  }
}

/**
 * Thrown when config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: Error) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your .vaultsmith/config.yaml and VAULT_* environment variables',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

/**
 * Thrown when config inheritance creates a loop
 */
export class CircularExtendsError extends ConfigError {
  constructor(configPath: string) {
    super(`Circular config inheritance detected: ${configPath}`, 'CIRCULAR_EXTENDS', {
      suggestion: 'Check your "extends" fields for circular references',
      context: { configPath }
    })
    this.name = 'CircularExtendsError'
  }
}

/**
 * Thrown when config inheritance is too deep
 */
export class ExtendsDepthError extends ConfigError {
  constructor(maxDepth: number) {
    super(`Config inheritance depth exceeded (max ${maxDepth})`, 'EXTENDS_DEPTH_EXCEEDED', {
      suggestion: 'Reduce nesting of "extends" in your config files',
      context: { maxDepth }
    })
    this.name = 'ExtendsDepthError'
  }
}

// =============================================================================
// Manifest Errors
// =============================================================================

export class ManifestError extends VaultsmithError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ManifestError'
  }
}

/**
 * Thrown when the given patterns match no manifest file
 */
export class NoManifestsError extends ManifestError {
  constructor(patterns: string[]) {
    super(`No manifests found matching: ${patterns.join(', ')}`, 'NO_MANIFESTS', {
      suggestion: 'Pass YAML files or directories with -f, or use -r to search recursively',
      context: { patterns }
    })
    this.name = 'NoManifestsError'
  }
}

/**
 * Thrown when a manifest document is not valid YAML or fails schema validation
 */
export class ManifestParseError extends ManifestError {
  readonly file: string
  readonly document?: number
  readonly issues: string[]

  constructor(file: string, issues: string[], document?: number, cause?: Error) {
    const where = document === undefined ? file : `${file} (document ${document + 1})`
    super(`Unable to decode ${where}: ${issues.join('; ')}`, 'MANIFEST_INVALID', {
      context: { file, document, issues },
      cause
    })
    this.name = 'ManifestParseError'
    this.file = file
    this.document = document
    this.issues = issues
  }
}

/**
 * Thrown when two manifest entries share the same kind and identity
 */
export class DuplicateResourceError extends ManifestError {
  constructor(kind: string, identity: string, sources: string[] = []) {
    super(`Duplicate ${kind} '${identity}'`, 'DUPLICATE_RESOURCE', {
      suggestion: sources.length > 0 ? `Declared in: ${sources.join(', ')}` : undefined,
      context: { kind, identity, sources }
    })
    this.name = 'DuplicateResourceError'
  }
}

/**
 * Thrown when references form a cycle; `cycle` repeats the first node at the end
 */
export class DependencyCycleError extends ManifestError {
  readonly cycle: string[]

  constructor(cycle: string[]) {
    super(`Dependency cycle detected: ${cycle.join(' -> ')}`, 'DEPENDENCY_CYCLE', {
      suggestion: 'Break the cycle by removing one of the references',
      context: { cycle }
    })
    this.name = 'DependencyCycleError'
    this.cycle = cycle
  }
}

export interface UnresolvedReference {
  /** Referenced resource, e.g. "PasswordPolicy 'example'" */
  target: string
  /** Resources that declared the reference */
  referencedBy: string[]
}

/**
 * Thrown when references point at resources that are neither declared nor present in Vault
 */
export class UnresolvedReferenceError extends ManifestError {
  readonly references: UnresolvedReference[]

  constructor(references: UnresolvedReference[]) {
    const list = references
      .map(ref => `${ref.target} (referenced by ${ref.referencedBy.join(', ')})`)
      .join(', ')
    super(`Unresolved references: ${list}`, 'UNRESOLVED_REFERENCE', {
      suggestion: 'Declare the missing resources in the manifest or create them in Vault first',
      context: { references }
    })
    this.name = 'UnresolvedReferenceError'
    this.references = references
  }
}

// =============================================================================
// Gateway Errors
// =============================================================================

export type GatewayErrorReason =
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'conflict'
  | 'invalid'
  | 'unavailable'
  | 'unknown'

const GATEWAY_SUGGESTIONS: Partial<Record<GatewayErrorReason, string>> = {
  unauthorized: 'Check VAULT_TOKEN or the configured auth method',
  forbidden: 'The token policy does not allow this operation',
  unavailable: 'Check that Vault is reachable and unsealed',
  conflict: 'The remote object changed concurrently; re-run apply'
}

/**
 * Thrown by the remote state gateway; surfaced verbatim as a resource failure cause
 */
export class GatewayError extends VaultsmithError {
  readonly reason: GatewayErrorReason
  readonly status?: number

  constructor(
    message: string,
    reason: GatewayErrorReason,
    options: { status?: number; context?: Record<string, unknown>; cause?: Error } = {}
  ) {
    super(message, `GATEWAY_${reason.toUpperCase()}`, {
      suggestion: GATEWAY_SUGGESTIONS[reason],
      context: { ...options.context, reason, status: options.status },
      cause: options.cause
    })
    this.name = 'GatewayError'
    this.reason = reason
    this.status = options.status
  }
}

// =============================================================================
// Policy Violations
// =============================================================================

export class PolicyViolationError extends VaultsmithError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'PolicyViolationError'
  }
}

/**
 * Thrown when a secret's declared version is lower than the version recorded in Vault
 */
export class VersionDowngradeError extends PolicyViolationError {
  constructor(resource: string, desired: number, recorded: number) {
    super(
      `${resource} version ${desired} is lower than the applied version ${recorded}`,
      'VERSION_DOWNGRADE',
      {
        suggestion: `Use version ${recorded} to keep the secret or ${recorded + 1} to regenerate it`,
        context: { resource, desired, recorded }
      }
    )
    this.name = 'VersionDowngradeError'
  }
}

/**
 * Thrown when a change touches fields that cannot be updated in place
 */
export class ImmutableFieldError extends PolicyViolationError {
  readonly fields: string[]

  constructor(resource: string, fields: string[]) {
    super(`${resource} cannot be updated in place, immutable fields changed: ${fields.join(', ')}`, 'IMMUTABLE_FIELD', {
      suggestion: 'Revert the change or declare a new resource under a different path',
      context: { resource, fields }
    })
    this.name = 'ImmutableFieldError'
    this.fields = fields
  }
}

/**
 * Thrown when an object exists in Vault but carries no applied snapshot
 */
export class UnmanagedResourceError extends PolicyViolationError {
  constructor(resource: string) {
    super(`${resource} already exists in Vault but was not created by vaultsmith`, 'UNMANAGED_RESOURCE', {
      suggestion: 'Choose another path or remove the existing object',
      context: { resource }
    })
    this.name = 'UnmanagedResourceError'
  }
}

export class PasswordPolicyNotFoundError extends PolicyViolationError {
  constructor(policyPath: string, resource: string) {
    super(`Password policy '${policyPath}' not found (required by ${resource})`, 'PASSWORD_POLICY_NOT_FOUND', {
      context: { policyPath, resource }
    })
    this.name = 'PasswordPolicyNotFoundError'
  }
}

// =============================================================================
// Run Errors
// =============================================================================

export class RunError extends VaultsmithError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'RunError'
  }
}

/**
 * Recorded on every resource that was not attempted because a dependency failed
 */
export class DependencyBlockedError extends RunError {
  readonly dependency: string

  constructor(dependency: string) {
    super(`Blocked by dependency ${dependency}`, 'DEPENDENCY_BLOCKED', {
      context: { dependency }
    })
    this.name = 'DependencyBlockedError'
    this.dependency = dependency
  }
}

export class CancelledError extends RunError {
  constructor(reason?: string) {
    super(reason ? `Cancelled: ${reason}` : 'Cancelled', 'CANCELLED')
    this.name = 'CancelledError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isVaultsmithError(error: unknown): error is VaultsmithError {
  return error instanceof VaultsmithError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isManifestError(error: unknown): error is ManifestError {
  return error instanceof ManifestError
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError
}

export function isPolicyViolationError(error: unknown): error is PolicyViolationError {
  return error instanceof PolicyViolationError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isVaultsmithError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a VaultsmithError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): VaultsmithError {
  if (isVaultsmithError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new VaultsmithError(error.message, defaultCode, { cause: error })
  }
  return new VaultsmithError(String(error), defaultCode)
}
