import { describe, it, expect } from 'vitest'
import { diffSpec } from '../../src/domain/diff.js'
import type { IssuerSpec, PKIRoleSpec, SecretsEngineSpec } from '../../src/domain/types.js'

describe('diffSpec', () => {
  const engine: SecretsEngineSpec = {
    path: 'kv',
    engine: { type: 'kv-v2', description: 'app secrets', maxVersions: 5, config: { defaultLeaseTtl: '1h' } }
  }

  it('finds no changes between equal specs', () => {
    expect(diffSpec('SecretsEngine', engine, structuredClone(engine))).toEqual({ changed: [], immutable: [] })
  })

  it('treats missing keys and undefined values alike', () => {
    const withUndefined: SecretsEngineSpec = { path: 'kv', engine: { ...engine.engine, local: undefined } }
    expect(diffSpec('SecretsEngine', withUndefined, engine).changed).toEqual([])
  })

  it('reports nested changes as sorted dotted paths', () => {
    const desired: SecretsEngineSpec = {
      path: 'kv',
      engine: { type: 'kv-v2', description: 'renamed', maxVersions: 10, config: { defaultLeaseTtl: '2h' } }
    }
    expect(diffSpec('SecretsEngine', desired, engine)).toEqual({
      changed: ['engine.config.defaultLeaseTtl', 'engine.description', 'engine.maxVersions'],
      immutable: []
    })
  })

  it('flags immutable engine fields', () => {
    const desired: SecretsEngineSpec = { path: 'kv', engine: { ...engine.engine, sealWrap: true } }
    expect(diffSpec('SecretsEngine', desired, engine)).toEqual({
      changed: ['engine.sealWrap'],
      immutable: ['engine.sealWrap']
    })
  })

  it('treats any certificate change of an issuer as immutable and options as mutable', () => {
    const current: IssuerSpec = {
      secretsEnginePath: 'pki',
      name: 'root',
      certificate: { type: 'internal', commonName: 'Root CA', ttl: '87600h' },
      options: { usage: 'read-only,issuing-certificates' }
    }
    const desired: IssuerSpec = {
      ...current,
      certificate: { ...current.certificate, ttl: '43800h' },
      options: { usage: 'read-only,issuing-certificates,crl-signing' }
    }

    expect(diffSpec('Issuer', desired, current)).toEqual({
      changed: ['certificate.ttl', 'options.usage'],
      immutable: ['certificate.ttl']
    })
  })

  it('compares arrays as whole values', () => {
    const current: PKIRoleSpec = { secretsEnginePath: 'pki', name: 'web', role: { issuerRef: 'pki/root', allowedDomains: ['a.test', 'b.test'] } }
    const reordered: PKIRoleSpec = { ...current, role: { ...current.role, allowedDomains: ['b.test', 'a.test'] } }

    expect(diffSpec('PKIRole', current, structuredClone(current)).changed).toEqual([])
    expect(diffSpec('PKIRole', reordered, current)).toEqual({ changed: ['role.allowedDomains'], immutable: [] })
  })

  it('reports a field added on one side', () => {
    const current: PKIRoleSpec = { secretsEnginePath: 'pki', name: 'web', role: { issuerRef: 'pki/root' } }
    const desired: PKIRoleSpec = { ...current, role: { ...current.role, maxTtl: '72h' } }
    expect(diffSpec('PKIRole', desired, current).changed).toEqual(['role.maxTtl'])
  })
})
