/**
 * Vaultsmith Client - HTTP client for the Vault API
 *
 * Wraps undici's fetch with Vault headers, per-request timeouts, optional
 * retries and mapping of HTTP failures to GatewayError reasons.
 *
 * Supports two auth methods:
 * - token: the token is checked with auth/token/lookup-self
 * - kubernetes: a service account JWT is exchanged for a client token
 */

import fs from 'node:fs/promises'
import { Agent, fetch as undiciFetch, type Dispatcher } from 'undici'
import { z } from 'zod'
import { GatewayError, isGatewayError, type GatewayErrorReason } from './lib/errors.js'
import { OperationTimeoutError, withRetry, withTimeout } from './lib/timeout.js'
import type {
  AuthConfig,
  FetchLike,
  HttpMethod,
  RequestTrace,
  VaultClientOptions
} from './types.js'

const DEFAULT_TIMEOUT_MS = 30_000
const DEFAULT_RETRY_DELAY_MS = 500

const CAS_MISMATCH = 'check-and-set parameter did not match the current version'

const errorBodySchema = z.object({ errors: z.array(z.string()) }).passthrough()

const responseSchema = z.object({
  data: z.record(z.unknown()).nullable().optional(),
  auth: z.object({ client_token: z.string() }).passthrough().nullable().optional(),
  warnings: z.array(z.string()).nullable().optional()
}).passthrough()

export type VaultResponse = z.infer<typeof responseSchema>

/**
 * Map an HTTP failure to a gateway error reason
 */
export function reasonForStatus(status: number, messages: string[] = []): GatewayErrorReason {
  switch (status) {
    case 400:
      return messages.some(message => message.includes(CAS_MISMATCH)) ? 'conflict' : 'invalid'
    case 422:
      return 'invalid'
    case 401:
      return 'unauthorized'
    case 403:
      return 'forbidden'
    case 404:
      return 'not_found'
    case 409:
    case 412:
      return 'conflict'
    case 429:
    case 502:
    case 503:
    case 504:
      return 'unavailable'
    default:
      return 'unknown'
  }
}

function parseJson(text: string): unknown {
  if (!text) return undefined
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

function errorMessages(body: unknown): string[] {
  const parsed = errorBodySchema.safeParse(body)
  return parsed.success ? parsed.data.errors : []
}

export class VaultClient {
  private readonly baseUrl: string
  private readonly namespace?: string
  private readonly auth: AuthConfig
  private readonly timeoutMs: number
  private readonly retries: number
  private readonly retryDelayMs: number
  private readonly dispatcher?: Dispatcher
  private readonly ownsDispatcher: boolean
  private readonly fetchImpl: FetchLike
  private readonly onRequest?: (trace: RequestTrace) => void
  private token: string | null = null

  constructor(options: VaultClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.namespace = options.namespace
    this.auth = options.auth
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.retries = options.retries ?? 0
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
    this.onRequest = options.onRequest

    if (options.fetch) {
      this.fetchImpl = options.fetch
      this.dispatcher = options.dispatcher
      this.ownsDispatcher = false
    } else {
      this.dispatcher = options.dispatcher ?? new Agent({ connections: 16 })
      this.ownsDispatcher = !options.dispatcher
      this.fetchImpl = (url, init) => undiciFetch(url, init)
    }

    if (this.auth.method === 'token') {
      this.token = this.auth.token
    }
  }

  /**
   * Obtain (kubernetes) or verify (token) the client token.
   *
   * A token rejected by lookup-self is reported as unauthorized even though
   * Vault answers 403.
   */
  async authenticate(): Promise<void> {
    if (this.auth.method === 'kubernetes') {
      const jwt = (await fs.readFile(this.auth.jwtPath, 'utf8')).trim()
      const response = await this.request('POST', `auth/${this.auth.mountPath}/login`, {
        role: this.auth.role,
        jwt
      }, { authenticated: false })
      const token = response?.auth?.client_token
      if (!token) {
        throw new GatewayError('Kubernetes login returned no client token', 'unauthorized')
      }
      this.token = token
      return
    }

    try {
      await this.request('GET', 'auth/token/lookup-self')
    } catch (error) {
      if (isGatewayError(error) && error.reason === 'forbidden') {
        throw new GatewayError('Vault rejected the token', 'unauthorized', { status: error.status, cause: error })
      }
      throw error
    }
  }

  /**
   * GET a path. Resolves null on 404.
   */
  async read(path: string): Promise<VaultResponse | null> {
    try {
      return await this.request('GET', path)
    } catch (error) {
      if (isGatewayError(error) && error.reason === 'not_found') {
        return null
      }
      throw error
    }
  }

  /**
   * POST a JSON body. Resolves null for empty (204) responses.
   */
  async write(path: string, body: Record<string, unknown>): Promise<VaultResponse | null> {
    return this.request('POST', path, body)
  }

  async request(
    method: HttpMethod,
    path: string,
    body?: Record<string, unknown>,
    options: { authenticated?: boolean } = {}
  ): Promise<VaultResponse | null> {
    const attempts = this.retries + 1
    return withRetry(() => this.send(method, path, body, options.authenticated ?? true), {
      maxAttempts: attempts,
      delayMs: this.retryDelayMs,
      shouldRetry: error => isGatewayError(error) && error.reason === 'unavailable'
    })
  }

  /**
   * Release pooled connections
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher && this.dispatcher) {
      await this.dispatcher.close()
    }
  }

  private headers(authenticated: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': 'application/json'
    }
    if (authenticated && this.token) {
      headers['X-Vault-Token'] = this.token
    }
    if (this.namespace) {
      headers['X-Vault-Namespace'] = this.namespace
    }
    return headers
  }

  private async send(
    method: HttpMethod,
    path: string,
    body: Record<string, unknown> | undefined,
    authenticated: boolean
  ): Promise<VaultResponse | null> {
    const cleanPath = path.replace(/^\/+/, '')
    const url = `${this.baseUrl}/v1/${cleanPath}`
    const operation = `${method} ${cleanPath}`
    const controller = new AbortController()
    const startTime = Date.now()
    let status: number | undefined

    try {
      const response = await withTimeout(
        this.fetchImpl(url, {
          method,
          headers: this.headers(authenticated),
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: controller.signal,
          dispatcher: this.dispatcher
        }),
        this.timeoutMs,
        operation,
        controller
      )
      status = response.status
      const payload = parseJson(await response.text())

      if (status >= 400) {
        const messages = errorMessages(payload)
        const detail = messages.length > 0 ? messages.join('; ') : `HTTP ${status}`
        throw new GatewayError(`${operation}: ${detail}`, reasonForStatus(status, messages), {
          status,
          context: { path: cleanPath, errors: messages }
        })
      }

      if (payload === undefined) {
        return null
      }
      const parsed = responseSchema.safeParse(payload)
      if (!parsed.success) {
        throw new GatewayError(`${operation}: unexpected response body`, 'unknown', { status })
      }
      return parsed.data
    } catch (error) {
      if (isGatewayError(error)) {
        throw error
      }
      if (error instanceof OperationTimeoutError) {
        throw new GatewayError(error.message, 'unavailable', { cause: error })
      }
      const cause = error instanceof Error ? error : new Error(String(error))
      throw new GatewayError(`${operation}: ${cause.message}`, 'unavailable', { cause })
    } finally {
      this.onRequest?.({ method, path: cleanPath, status, durationMs: Date.now() - startTime })
    }
  }
}

// Factory function for creating clients
export function createClient(options: VaultClientOptions): VaultClient {
  return new VaultClient(options)
}

export default VaultClient
