/**
 * Vaultsmith - Type Definitions
 */

import type { Dispatcher } from 'undici'

// ============================================================================
// Configuration Types
// ============================================================================

export interface TokenAuthConfig {
  method: 'token'
  token: string
}

/**
 * Kubernetes auth: the service account JWT is read from `jwtPath` and
 * exchanged for a client token at `auth/<mountPath>/login`.
 */
export interface KubernetesAuthConfig {
  method: 'kubernetes'
  mountPath: string
  role: string
  jwtPath: string
}

export type AuthConfig = TokenAuthConfig | KubernetesAuthConfig

/** Where the last-applied snapshots of non-secret resources are kept */
export interface StorageConfig {
  /** KV v1 engine holding the snapshots */
  secretsEnginePath: string
  /** Prefix inside that engine */
  snapshotsPath: string
}

export interface VaultsmithConfig {
  /** Path to a parent config file, relative to this one */
  extends?: string
  baseUrl: string
  namespace?: string
  auth: AuthConfig
  storage: StorageConfig
  /** Maximum number of Vault calls in flight */
  concurrency: number
  /** Per-request timeout */
  timeoutMs: number
  /** Extra attempts for requests that fail with an unavailable server */
  retries: number
}

export const DEFAULT_STORAGE: StorageConfig = {
  secretsEnginePath: 'vaultsmith/state',
  snapshotsPath: 'snapshots'
}

export const DEFAULT_KUBERNETES_JWT_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/token'

// ============================================================================
// Client Types
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'LIST'

/** Reported after every HTTP exchange with Vault */
export interface RequestTrace {
  method: HttpMethod
  path: string
  /** HTTP status; absent when the request never got a response */
  status?: number
  durationMs: number
}

export interface VaultClientOptions {
  baseUrl: string
  namespace?: string
  auth: AuthConfig
  timeoutMs?: number
  retries?: number
  /** Base delay between retries */
  retryDelayMs?: number
  /** Custom undici dispatcher (proxy, TLS settings) */
  dispatcher?: Dispatcher
  /** Replace the HTTP transport, mostly for tests */
  fetch?: FetchLike
  onRequest?: (trace: RequestTrace) => void
}

export interface FetchInit {
  method: string
  headers: Record<string, string>
  body?: string
  signal: AbortSignal
  dispatcher?: Dispatcher
}

/** Minimal response surface the client relies on */
export interface FetchResponse {
  status: number
  text(): Promise<string>
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIArgs {
  file: string[]
  recursive: boolean
  concurrency?: number
  config?: string
  json: boolean
  verbose: boolean
}
