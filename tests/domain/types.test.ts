import { describe, it, expect } from 'vitest'
import {
  defineResource,
  emptyApplySummary,
  formatRef,
  isSecretKind,
  joinPath,
  normalizePath,
  refKey
} from '../../src/domain/types.js'

describe('normalizePath', () => {
  it('trims and collapses slashes', () => {
    expect(normalizePath('/kv//team/')).toBe('kv/team')
    expect(normalizePath('kv')).toBe('kv')
    expect(normalizePath('///')).toBe('')
  })
})

describe('joinPath', () => {
  it('joins segments into a normalized path', () => {
    expect(joinPath('kv/', '/app/db')).toBe('kv/app/db')
  })
})

describe('refKey / formatRef', () => {
  it('formats references', () => {
    const ref = { kind: 'Issuer' as const, identity: 'pki/root' }
    expect(refKey(ref)).toBe('Issuer:pki/root')
    expect(formatRef(ref)).toBe("Issuer 'pki/root'")
  })
})

describe('isSecretKind', () => {
  it('is true only for generated secrets', () => {
    expect(isSecretKind('Password')).toBe(true)
    expect(isSecretKind('SSHKey')).toBe(true)
    expect(isSecretKind('Issuer')).toBe(false)
  })
})

describe('defineResource', () => {
  it('derives identity and references for a password', () => {
    const resource = defineResource({
      kind: 'Password',
      spec: { secretsEnginePath: '/kv', path: 'app/db', secretKey: 'password', policyPath: 'policies/db/', version: 1, encoding: 'utf8' }
    }, { file: 'app.yaml', document: 1 })

    expect(resource.identity).toBe('kv/app/db')
    expect(resource.dependsOn).toEqual([
      { kind: 'SecretsEngine', identity: 'kv' },
      { kind: 'PasswordPolicy', identity: 'policies/db' }
    ])
    expect(resource.source).toEqual({ file: 'app.yaml', document: 1 })
  })

  it('adds the upstream issuer only for chained issuers', () => {
    const root = defineResource({
      kind: 'Issuer',
      spec: { secretsEnginePath: 'pki', name: 'root', certificate: { type: 'internal', commonName: 'Root CA' } }
    })
    const intermediate = defineResource({
      kind: 'Issuer',
      spec: {
        secretsEnginePath: 'pki-int',
        name: 'intermediate',
        certificate: { type: 'internal', commonName: 'Intermediate CA' },
        chaining: { upstreamIssuerRef: 'pki/root' }
      }
    })

    expect(root.dependsOn).toEqual([{ kind: 'SecretsEngine', identity: 'pki' }])
    expect(intermediate.identity).toBe('pki-int/intermediate')
    expect(intermediate.dependsOn).toEqual([
      { kind: 'SecretsEngine', identity: 'pki-int' },
      { kind: 'Issuer', identity: 'pki/root' }
    ])
  })

  it('references the engine and issuer of a role', () => {
    const resource = defineResource({
      kind: 'PKIRole',
      spec: { secretsEnginePath: 'pki', name: 'web', role: { issuerRef: 'pki/root', allowedDomains: ['example.test'] } }
    })

    expect(resource.identity).toBe('pki/web')
    expect(resource.dependsOn).toEqual([
      { kind: 'SecretsEngine', identity: 'pki' },
      { kind: 'Issuer', identity: 'pki/root' }
    ])
  })

  it('gives engines and policies no references', () => {
    expect(defineResource({ kind: 'SecretsEngine', spec: { path: 'kv', engine: { type: 'kv-v2' } } }).dependsOn).toEqual([])
    expect(defineResource({
      kind: 'PasswordPolicy',
      spec: { path: 'example', policy: { length: 16, rules: [{ charset: 'abc' }] } }
    }).dependsOn).toEqual([])
  })
})

describe('emptyApplySummary', () => {
  it('starts at zero', () => {
    expect(emptyApplySummary()).toEqual({ total: 0, succeeded: 0, failed: 0, elapsedMs: 0 })
  })
})
