import { describe, it, expect } from 'vitest'
import { splitMount, vaultPath } from '../../src/gateway/paths.js'

describe('vaultPath', () => {
  it('joins parts and drops empty segments', () => {
    expect(vaultPath('sys/mounts', '/team/kv/', 'tune')).toBe('sys/mounts/team/kv/tune')
  })

  it('encodes every segment', () => {
    expect(vaultPath('kv', 'data', 'app db/p@ss')).toBe('kv/data/app%20db/p%40ss')
  })
})

describe('splitMount', () => {
  it('prefers the longest known mount', () => {
    expect(splitMount('team/kv/app/db', ['team', 'team/kv'])).toEqual({ mount: 'team/kv', path: 'app/db' })
  })

  it('falls back to the first segment', () => {
    expect(splitMount('pki/root', [])).toEqual({ mount: 'pki', path: 'root' })
    expect(splitMount('pki', [])).toEqual({ mount: 'pki', path: '' })
  })

  it('ignores mounts that only share a prefix', () => {
    expect(splitMount('pki-int/root', ['pki'])).toEqual({ mount: 'pki-int', path: 'root' })
  })
})
