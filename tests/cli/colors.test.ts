import { describe, it, expect } from 'vitest'
import { c, stripAnsi, symbols } from '../../src/cli/lib/colors.js'

describe('colors', () => {
  it('strips SGR sequences', () => {
    expect(stripAnsi('\x1b[1m\x1b[92mdone\x1b[39m\x1b[22m')).toBe('done')
    expect(stripAnsi('plain')).toBe('plain')
  })

  it('keeps the text of every semantic color', () => {
    expect(stripAnsi(c.success('done'))).toBe('done')
    expect(stripAnsi(c.error('failed: denied'))).toBe('failed: denied')
    expect(stripAnsi(c.label('external:'))).toBe('external:')
    expect(stripAnsi(c.muted('[vaultsmith] 2 resources'))).toBe('[vaultsmith] 2 resources')
  })

  it('renders the progress arrow', () => {
    expect(stripAnsi(symbols.arrow)).toBe('=>')
  })
})
