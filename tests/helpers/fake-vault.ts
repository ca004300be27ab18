/**
 * In-process stand-in for the Vault HTTP API
 *
 * Covers the endpoints VaultClient and VaultGateway use: token lookup,
 * kubernetes login, sys/mounts, password policies, KV v1, KV v2 and the pki
 * issuer and role endpoints. Plugged into VaultClient through its `fetch` option.
 */

import type { FetchInit, FetchLike, FetchResponse } from '../../src/types.js'

export interface RecordedRequest {
  method: string
  path: string
  body?: Record<string, unknown>
  headers: Record<string, string>
}

interface KvV2Secret {
  versions: Record<string, unknown>[]
  customMetadata: Record<string, string>
}

interface PkiIssuer {
  id: string
  name: string
  fields: Record<string, unknown>
}

interface Mount {
  type: string
  options: Record<string, string>
  tune: Record<string, unknown>
  config: Record<string, unknown>
  kv: Map<string, Record<string, unknown>>
  secrets: Map<string, KvV2Secret>
  issuers: PkiIssuer[]
  roles: Map<string, Record<string, unknown>>
}

class Reply {
  constructor(readonly status: number, readonly body?: unknown) {}
}

const ok = (data: unknown) => new Reply(200, { data })
const noContent = () => new Reply(204)
const failure = (status: number, ...errors: string[]) => new Reply(status, { errors })

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringRecord(value: unknown): Record<string, string> {
  const result: Record<string, string> = {}
  if (isRecord(value)) {
    for (const [key, item] of Object.entries(value)) {
      if (typeof item === 'string') result[key] = item
    }
  }
  return result
}

export class FakeVault {
  readonly requests: RecordedRequest[] = []
  readonly mounts = new Map<string, Mount>()
  readonly passwordPolicies = new Map<string, string>()

  token = 'test-token'
  kubernetesJwt = 'test-jwt'
  /** Reply with 503 to the next N requests */
  unavailableFor = 0

  private issuerSeq = 0

  constructor() {
    this.mount('secret', 'kv', { version: '2' })
  }

  readonly fetch: FetchLike = async (url: string, init: FetchInit): Promise<FetchResponse> => {
    const { pathname } = new URL(url)
    const path = pathname
      .replace(/^\/v1\//, '')
      .split('/')
      .map(segment => decodeURIComponent(segment))
      .join('/')
    const parsed: unknown = init.body === undefined ? undefined : JSON.parse(init.body)
    const body = isRecord(parsed) ? parsed : undefined

    this.requests.push({ method: init.method, path, body, headers: init.headers })

    const reply = this.handle(init.method, path, body ?? {}, init.headers)
    const text = reply.body === undefined ? '' : JSON.stringify(reply.body)
    return { status: reply.status, text: async () => text }
  }

  // ==========================================================================
  // Seeding & inspection
  // ==========================================================================

  mount(path: string, type: string, options: Record<string, string> = {}): Mount {
    const mount: Mount = {
      type,
      options,
      tune: {},
      config: {},
      kv: new Map(),
      secrets: new Map(),
      issuers: [],
      roles: new Map()
    }
    this.mounts.set(path, mount)
    return mount
  }

  /** Requests as "METHOD path", in order */
  log(): string[] {
    return this.requests.map(request => `${request.method} ${request.path}`)
  }

  /** Requests that changed state */
  writes(): string[] {
    return this.requests.filter(request => request.method === 'POST').map(request => request.path)
  }

  secret(mount: string, path: string): KvV2Secret | undefined {
    return this.mounts.get(mount)?.secrets.get(path)
  }

  issuer(mount: string, ref: string): PkiIssuer | undefined {
    return this.findIssuer(mount, ref)
  }

  // ==========================================================================
  // Routing
  // ==========================================================================

  private handle(method: string, path: string, body: Record<string, unknown>, headers: Record<string, string>): Reply {
    if (this.unavailableFor > 0) {
      this.unavailableFor--
      return failure(503, 'Vault is sealed')
    }

    if (path.startsWith('auth/') && path.endsWith('/login')) {
      return this.login(body)
    }
    if (headers['X-Vault-Token'] !== this.token) {
      return failure(403, 'permission denied')
    }

    if (path === 'auth/token/lookup-self') {
      return ok({ id: this.token, policies: ['root'] })
    }
    if (path === 'sys/mounts' && method === 'GET') {
      return ok(this.mountTable())
    }
    if (path.startsWith('sys/mounts/')) {
      return this.sysMounts(method, path.slice('sys/mounts/'.length), body)
    }
    if (path.startsWith('sys/policies/password/')) {
      return this.passwordPolicy(method, path.slice('sys/policies/password/'.length), body)
    }

    const located = this.locate(path)
    if (!located) {
      return failure(404)
    }
    const [mountPath, mount, rest] = located

    if (mount.type === 'kv' && mount.options.version === '2') {
      return this.kvV2(method, mount, rest, body)
    }
    if (mount.type === 'kv') {
      return this.kvV1(method, mount, rest, body)
    }
    if (mount.type === 'pki') {
      return this.pki(method, mountPath, mount, rest, body)
    }
    return failure(404)
  }

  private locate(path: string): [string, Mount, string] | undefined {
    let best: string | undefined
    for (const mountPath of this.mounts.keys()) {
      if (path.startsWith(`${mountPath}/`) && (!best || mountPath.length > best.length)) {
        best = mountPath
      }
    }
    const mount = best === undefined ? undefined : this.mounts.get(best)
    return best === undefined || !mount ? undefined : [best, mount, path.slice(best.length + 1)]
  }

  private login(body: Record<string, unknown>): Reply {
    if (body.jwt !== this.kubernetesJwt) {
      return failure(403, 'permission denied')
    }
    return new Reply(200, { auth: { client_token: this.token, policies: ['deployer'] } })
  }

  // ==========================================================================
  // sys/
  // ==========================================================================

  private mountTable(): Record<string, unknown> {
    const table: Record<string, unknown> = {}
    for (const [path, mount] of this.mounts) {
      table[`${path}/`] = { type: mount.type, options: Object.keys(mount.options).length > 0 ? mount.options : null }
    }
    return table
  }

  private sysMounts(method: string, rest: string, body: Record<string, unknown>): Reply {
    if (rest.endsWith('/tune')) {
      const mount = this.mounts.get(rest.slice(0, -'/tune'.length))
      if (!mount) {
        return failure(400, `cannot fetch sysview for path "${rest.slice(0, -'/tune'.length)}/"`)
      }
      if (method === 'GET') {
        return ok({ default_lease_ttl: 2764800, max_lease_ttl: 2764800, ...mount.tune })
      }
      Object.assign(mount.tune, body)
      return noContent()
    }

    if (method !== 'POST') {
      return failure(405)
    }
    if (this.mounts.has(rest)) {
      return failure(400, `path is already in use at ${rest}/`)
    }
    const type = typeof body.type === 'string' ? body.type : 'kv'
    const mount = this.mount(rest, type, stringRecord(body.options))
    if (typeof body.description === 'string') {
      mount.tune.description = body.description
    }
    if (isRecord(body.config)) {
      Object.assign(mount.tune, body.config)
    }
    return noContent()
  }

  private passwordPolicy(method: string, name: string, body: Record<string, unknown>): Reply {
    if (method === 'GET') {
      const policy = this.passwordPolicies.get(name)
      return policy === undefined ? failure(404) : ok({ policy })
    }
    if (typeof body.policy !== 'string') {
      return failure(400, 'missing policy')
    }
    this.passwordPolicies.set(name, body.policy)
    return noContent()
  }

  // ==========================================================================
  // KV
  // ==========================================================================

  private kvV1(method: string, mount: Mount, path: string, body: Record<string, unknown>): Reply {
    if (method === 'GET') {
      const data = mount.kv.get(path)
      return data ? ok(data) : failure(404)
    }
    mount.kv.set(path, body)
    return noContent()
  }

  private kvV2(method: string, mount: Mount, rest: string, body: Record<string, unknown>): Reply {
    if (rest === 'config') {
      if (method === 'GET') {
        return ok({ max_versions: 0, cas_required: false, delete_version_after: '0s', ...mount.config })
      }
      Object.assign(mount.config, body)
      return noContent()
    }

    const slash = rest.indexOf('/')
    const section = rest.slice(0, slash)
    const path = rest.slice(slash + 1)
    const secret = mount.secrets.get(path)

    if (section === 'data') {
      if (method === 'GET') {
        const latest = secret?.versions[secret.versions.length - 1]
        return latest && secret
          ? ok({ data: latest, metadata: { version: secret.versions.length } })
          : failure(404)
      }

      const cas = isRecord(body.options) ? body.options.cas : undefined
      const current = secret?.versions.length ?? 0
      if (typeof cas === 'number' && cas !== current) {
        return failure(400, 'check-and-set parameter did not match the current version')
      }
      const entry = secret ?? { versions: [], customMetadata: {} }
      entry.versions.push(isRecord(body.data) ? body.data : {})
      mount.secrets.set(path, entry)
      return ok({ version: entry.versions.length })
    }

    if (section === 'metadata') {
      if (method === 'GET') {
        return secret
          ? ok({ current_version: secret.versions.length, custom_metadata: secret.customMetadata })
          : failure(404)
      }
      const entry = secret ?? { versions: [], customMetadata: {} }
      entry.customMetadata = stringRecord(body.custom_metadata)
      mount.secrets.set(path, entry)
      return noContent()
    }

    return failure(404)
  }

  // ==========================================================================
  // PKI
  // ==========================================================================

  private findIssuer(mountPath: string, ref: string): PkiIssuer | undefined {
    return this.mounts.get(mountPath)?.issuers.find(issuer => issuer.id === ref || issuer.name === ref)
  }

  private addIssuer(mount: Mount, name: string, fields: Record<string, unknown>): PkiIssuer {
    const issuer = { id: `issuer-${++this.issuerSeq}`, name, fields }
    mount.issuers.push(issuer)
    return issuer
  }

  private pki(method: string, mountPath: string, mount: Mount, rest: string, body: Record<string, unknown>): Reply {
    const segments = rest.split('/')

    if (rest.startsWith('issuers/generate/root/')) {
      const name = typeof body.issuer_name === 'string' ? body.issuer_name : ''
      const issuer = this.addIssuer(mount, name, body)
      return ok({ issuer_id: issuer.id, certificate: `CERT(${name})` })
    }

    if (rest.startsWith('issuers/generate/intermediate/')) {
      return ok({ csr: `CSR(${String(body.common_name)})` })
    }

    if (rest === 'intermediate/set-signed') {
      const issuer = this.addIssuer(mount, '', { certificate: body.certificate })
      return ok({ imported_issuers: [issuer.id], imported_keys: [] })
    }

    if (segments[0] === 'issuer' && segments.length === 3 && segments[2] === 'sign-intermediate') {
      const upstream = this.findIssuer(mountPath, segments[1])
      if (!upstream) {
        return failure(500, `unable to find PKI issuer for reference: ${segments[1]}`)
      }
      return ok({ certificate: `SIGNED(${String(body.csr)} by ${upstream.name})` })
    }

    if (segments[0] === 'issuer' && segments.length === 2) {
      const issuer = this.findIssuer(mountPath, segments[1])
      if (!issuer) {
        return failure(500, `unable to find PKI issuer for reference: ${segments[1]}`)
      }
      if (method === 'GET') {
        return ok({ issuer_id: issuer.id, issuer_name: issuer.name, ...issuer.fields })
      }
      if (typeof body.issuer_name === 'string') {
        issuer.name = body.issuer_name
      }
      Object.assign(issuer.fields, body)
      return ok({ issuer_id: issuer.id, issuer_name: issuer.name })
    }

    if (segments[0] === 'roles' && segments.length === 2) {
      if (method === 'GET') {
        const role = mount.roles.get(segments[1])
        return role ? ok(role) : failure(404)
      }
      mount.roles.set(segments[1], body)
      return noContent()
    }

    return failure(404)
  }
}
