/**
 * Tests for client.ts
 * HTTP exchanges go through an undici MockAgent; auth flows use the in-process FakeVault
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { MockAgent } from 'undici'
import { VaultClient, createClient, reasonForStatus } from '../src/client.js'
import { GatewayError } from '../src/lib/errors.js'
import type { RequestTrace } from '../src/types.js'
import { FakeVault } from './helpers/fake-vault.js'

const BASE_URL = 'http://vault.test:8200'

async function gatewayError(promise: Promise<unknown>): Promise<GatewayError> {
  const error = await promise.catch((e: unknown) => e)
  if (error instanceof GatewayError) return error
  throw new Error(`expected a GatewayError, got ${String(error)}`)
}

describe('VaultClient over HTTP', () => {
  let agent: MockAgent
  let traces: RequestTrace[]
  let client: VaultClient

  beforeEach(() => {
    agent = new MockAgent()
    agent.disableNetConnect()
    traces = []
    client = createClient({
      baseUrl: `${BASE_URL}/`,
      namespace: 'team-a',
      auth: { method: 'token', token: 'test-token' },
      dispatcher: agent,
      retryDelayMs: 1,
      onRequest: trace => traces.push(trace)
    })
  })

  afterEach(async () => {
    await client.close()
    await agent.close()
  })

  it('sends Vault headers and returns the parsed body', async () => {
    agent.get(BASE_URL)
      .intercept({
        path: '/v1/sys/mounts/kv/tune',
        method: 'GET',
        headers: { 'x-vault-token': 'test-token', 'x-vault-namespace': 'team-a' }
      })
      .reply(200, { data: { description: 'app secrets' } })

    const response = await client.read('/sys/mounts/kv/tune')

    expect(response?.data).toEqual({ description: 'app secrets' })
    expect(traces).toHaveLength(1)
    expect(traces[0].method).toBe('GET')
    expect(traces[0].path).toBe('sys/mounts/kv/tune')
    expect(traces[0].status).toBe(200)
  })

  it('resolves null for a missing object', async () => {
    agent.get(BASE_URL).intercept({ path: '/v1/kv/metadata/missing', method: 'GET' }).reply(404, { errors: [] })

    expect(await client.read('kv/metadata/missing')).toBeNull()
  })

  it('posts JSON and resolves null for empty responses', async () => {
    agent.get(BASE_URL)
      .intercept({ path: '/v1/kv/config', method: 'POST', body: JSON.stringify({ max_versions: 5 }) })
      .reply(204, '')

    expect(await client.write('kv/config', { max_versions: 5 })).toBeNull()
  })

  it('joins Vault error messages', async () => {
    agent.get(BASE_URL)
      .intercept({ path: '/v1/sys/mounts/kv', method: 'POST' })
      .reply(400, { errors: ['path is already in use at kv/', 'second problem'] })

    const error = await gatewayError(client.write('sys/mounts/kv', { type: 'kv' }))

    expect(error.message).toBe('POST sys/mounts/kv: path is already in use at kv/; second problem')
    expect(error.reason).toBe('invalid')
    expect(error.status).toBe(400)
  })

  it('falls back to the status when the body has no errors', async () => {
    agent.get(BASE_URL).intercept({ path: '/v1/sys/mounts', method: 'GET' }).reply(500, 'internal')

    const error = await gatewayError(client.read('sys/mounts'))

    expect(error.message).toBe('GET sys/mounts: HTTP 500')
    expect(error.reason).toBe('unknown')
  })

  it('rejects a body that is not a Vault response', async () => {
    agent.get(BASE_URL).intercept({ path: '/v1/sys/mounts', method: 'GET' }).reply(200, '[1,2]')

    await expect(client.read('sys/mounts')).rejects.toThrow('GET sys/mounts: unexpected response body')
  })

  it('retries an unavailable server', async () => {
    const retrying = new VaultClient({
      baseUrl: BASE_URL,
      auth: { method: 'token', token: 'test-token' },
      dispatcher: agent,
      retries: 2,
      retryDelayMs: 1
    })
    const pool = agent.get(BASE_URL)
    pool.intercept({ path: '/v1/sys/mounts', method: 'GET' }).reply(503, { errors: ['Vault is sealed'] })
    pool.intercept({ path: '/v1/sys/mounts', method: 'GET' }).reply(200, { data: {} })

    expect((await retrying.read('sys/mounts'))?.data).toEqual({})
  })

  it('does not retry other failures', async () => {
    const retrying = new VaultClient({
      baseUrl: BASE_URL,
      auth: { method: 'token', token: 'test-token' },
      dispatcher: agent,
      retries: 2,
      retryDelayMs: 1
    })
    const pool = agent.get(BASE_URL)
    pool.intercept({ path: '/v1/sys/mounts', method: 'GET' }).reply(403, { errors: ['permission denied'] })
    pool.intercept({ path: '/v1/sys/mounts', method: 'GET' }).reply(200, { data: {} })

    const error = await gatewayError(retrying.read('sys/mounts'))
    expect(error.reason).toBe('forbidden')
  })

  it('times out slow requests as unavailable', async () => {
    const impatient = new VaultClient({
      baseUrl: BASE_URL,
      auth: { method: 'token', token: 'test-token' },
      dispatcher: agent,
      timeoutMs: 20
    })
    agent.get(BASE_URL).intercept({ path: '/v1/sys/health', method: 'GET' }).reply(200, { data: {} }).delay(500)

    const error = await gatewayError(impatient.read('sys/health'))

    expect(error.reason).toBe('unavailable')
    expect(error.message).toBe('Operation timed out after 20ms: GET sys/health')
  })
})

describe('VaultClient authentication', () => {
  let vault: FakeVault

  beforeEach(() => {
    vault = new FakeVault()
  })

  it('checks a token with lookup-self', async () => {
    const client = new VaultClient({ baseUrl: BASE_URL, auth: { method: 'token', token: 'test-token' }, fetch: vault.fetch })

    await client.authenticate()

    expect(vault.log()).toEqual(['GET auth/token/lookup-self'])
    expect(vault.requests[0].headers['X-Vault-Token']).toBe('test-token')
  })

  it('reports a rejected token as unauthorized', async () => {
    const client = new VaultClient({ baseUrl: BASE_URL, auth: { method: 'token', token: 'wrong-token' }, fetch: vault.fetch })

    const error = await gatewayError(client.authenticate())

    expect(error.message).toBe('Vault rejected the token')
    expect(error.reason).toBe('unauthorized')
    expect(error.status).toBe(403)
  })

  describe('kubernetes', () => {
    let tempDir: string
    let jwtPath: string

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vaultsmith-k8s-'))
      jwtPath = path.join(tempDir, 'token')
      fs.writeFileSync(jwtPath, 'test-jwt\n')
    })

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true })
    })

    it('exchanges the service account token for a client token', async () => {
      const client = new VaultClient({
        baseUrl: BASE_URL,
        auth: { method: 'kubernetes', mountPath: 'k8s', role: 'deployer', jwtPath },
        fetch: vault.fetch
      })

      await client.authenticate()
      await client.read('sys/mounts')

      expect(vault.requests[0]).toEqual({
        method: 'POST',
        path: 'auth/k8s/login',
        body: { role: 'deployer', jwt: 'test-jwt' },
        headers: { Accept: 'application/json', 'Content-Type': 'application/json' }
      })
      expect(vault.requests[1].headers['X-Vault-Token']).toBe('test-token')
    })

    it('fails when the login is refused', async () => {
      vault.kubernetesJwt = 'other-jwt'
      const client = new VaultClient({
        baseUrl: BASE_URL,
        auth: { method: 'kubernetes', mountPath: 'kubernetes', role: 'deployer', jwtPath },
        fetch: vault.fetch
      })

      const error = await gatewayError(client.authenticate())
      expect(error.reason).toBe('forbidden')
      expect(error.message).toBe('POST auth/kubernetes/login: permission denied')
    })
  })
})

describe('reasonForStatus', () => {
  it('maps HTTP statuses to gateway reasons', () => {
    expect(reasonForStatus(400)).toBe('invalid')
    expect(reasonForStatus(400, ['check-and-set parameter did not match the current version'])).toBe('conflict')
    expect(reasonForStatus(401)).toBe('unauthorized')
    expect(reasonForStatus(403)).toBe('forbidden')
    expect(reasonForStatus(404)).toBe('not_found')
    expect(reasonForStatus(412)).toBe('conflict')
    expect(reasonForStatus(429)).toBe('unavailable')
    expect(reasonForStatus(503)).toBe('unavailable')
    expect(reasonForStatus(500)).toBe('unknown')
  })
})
