/**
 * Timeout utilities for async operations
 *
 * Prevents Vault calls from hanging indefinitely when the server is slow or unresponsive.
 */

export class OperationTimeoutError extends Error {
  readonly timeoutMs: number

  constructor(operation: string, timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`)
    this.name = 'OperationTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export interface RetryOptions {
  maxAttempts?: number
  delayMs?: number
  backoffMultiplier?: number
  /** Return false to rethrow immediately */
  shouldRetry?: (error: Error) => boolean
  onRetry?: (attempt: number, error: Error) => void
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Retry an async operation with exponential backoff
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => client.read('sys/mounts/kv/tune'),
 *   { maxAttempts: 3, delayMs: 500, shouldRetry: isTransient }
 * )
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    delayMs = 1000,
    backoffMultiplier = 2,
    shouldRetry = () => true,
    onRetry
  } = options

  let lastError: Error | undefined

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn()
    } catch (error) {
      lastError = toError(error)

      if (attempt === maxAttempts || !shouldRetry(lastError)) {
        break
      }

      if (onRetry) {
        onRetry(attempt, lastError)
      }

      // Exponential backoff: 1s, 2s, 4s, 8s, etc.
      const delay = delayMs * Math.pow(backoffMultiplier, attempt - 1)
      await new Promise(resolve => setTimeout(resolve, delay))
    }
  }

  throw lastError ?? new Error('withRetry failed with unknown error')
}

/**
 * Wrap a promise with a timeout
 *
 * When `controller` is given it is aborted on timeout so the underlying request is released.
 *
 * @example
 * ```ts
 * const controller = new AbortController()
 * const response = await withTimeout(
 *   fetch(url, { signal: controller.signal }),
 *   30000,
 *   'GET sys/mounts/kv/tune',
 *   controller
 * )
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  controller?: AbortController
): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      controller?.abort()
      reject(new OperationTimeoutError(operation, timeoutMs))
    }, timeoutMs)
  })

  try {
    return await Promise.race([promise, timeoutPromise])
  } finally {
    clearTimeout(timeoutHandle)
  }
}
