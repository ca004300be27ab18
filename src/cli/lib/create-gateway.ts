/**
 * Shared helper for creating the Vault client and gateway from config
 */

import { VaultClient } from '../../client.js'
import { VaultGateway } from '../../gateway/vault.js'
import type { FetchLike, VaultsmithConfig } from '../../types.js'
import * as ui from '../ui.js'

export interface CreateGatewayOptions {
  config: VaultsmithConfig
  verbose?: boolean
  /** Replace the HTTP transport */
  fetch?: FetchLike
}

export interface GatewayHandle {
  client: VaultClient
  gateway: VaultGateway
}

export function createGatewayFromConfig(options: CreateGatewayOptions): GatewayHandle {
  const { config, verbose = false } = options

  const client = new VaultClient({
    baseUrl: config.baseUrl,
    namespace: config.namespace,
    auth: config.auth,
    timeoutMs: config.timeoutMs,
    retries: config.retries,
    fetch: options.fetch,
    onRequest: trace => ui.verbose(
      `${trace.method} /v1/${trace.path} ${trace.status ?? '---'} (${trace.durationMs}ms)`,
      verbose
    )
  })

  ui.verbose(`Vault at ${config.baseUrl}${config.namespace ? ` (namespace ${config.namespace})` : ''}, auth ${config.auth.method}`, verbose)

  return {
    client,
    gateway: new VaultGateway(client, { storage: config.storage })
  }
}

/**
 * Run `fn` with a connected gateway; the client's connections are released afterwards
 */
export async function withGateway<T>(
  options: CreateGatewayOptions,
  fn: (handle: GatewayHandle) => Promise<T>
): Promise<T> {
  const handle = createGatewayFromConfig(options)
  try {
    return await fn(handle)
  } finally {
    await handle.client.close()
  }
}
