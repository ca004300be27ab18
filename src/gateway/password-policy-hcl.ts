/**
 * Password policy documents
 *
 * Vault stores password policies as HCL:
 *
 *   length = 32
 *
 *   rule "charset" {
 *     charset = "abcdefghijklmnopqrstuvwxyz"
 *     min-chars = 1
 *   }
 *
 * Only `length` and `rule "charset"` blocks are understood.
 */

import type { CharsetRule, PasswordPolicyParams } from '../domain/types.js'
import { VaultsmithError } from '../lib/errors.js'

export class PasswordPolicySyntaxError extends VaultsmithError {
  constructor(message: string) {
    super(`Invalid password policy: ${message}`, 'PASSWORD_POLICY_SYNTAX')
    this.name = 'PasswordPolicySyntaxError'
  }
}

export function renderPasswordPolicy(policy: PasswordPolicyParams): string {
  const blocks = policy.rules.map(rule => {
    const lines = [`  charset = ${JSON.stringify(rule.charset)}`]
    if (rule.minChars !== undefined) {
      lines.push(`  min-chars = ${rule.minChars}`)
    }
    return `rule "charset" {\n${lines.join('\n')}\n}`
  })
  return [`length = ${policy.length}`, ...blocks].join('\n\n') + '\n'
}

// ============================================================================
// Parsing
// ============================================================================

type Token =
  | { type: 'string'; value: string }
  | { type: 'ident'; value: string }
  | { type: 'number'; value: number }
  | { type: 'punct'; value: '=' | '{' | '}' }

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', b: '\b', f: '\f', '"': '"', '\\': '\\' }

function readString(source: string, start: number): { value: string; end: number } {
  let value = ''
  let i = start + 1
  while (i < source.length) {
    const ch = source[i]
    if (ch === '"') {
      return { value, end: i + 1 }
    }
    if (ch === '\\') {
      const next = source[i + 1]
      if (next === 'u') {
        value += String.fromCharCode(parseInt(source.slice(i + 2, i + 6), 16))
        i += 6
        continue
      }
      const escaped = ESCAPES[next]
      if (escaped === undefined) {
        throw new PasswordPolicySyntaxError(`unknown escape \\${next}`)
      }
      value += escaped
      i += 2
      continue
    }
    value += ch
    i++
  }
  throw new PasswordPolicySyntaxError('unterminated string')
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = []
  let i = 0

  while (i < source.length) {
    const ch = source[i]

    if (/\s/.test(ch)) {
      i++
    } else if (ch === '#' || source.startsWith('//', i)) {
      const newline = source.indexOf('\n', i)
      i = newline === -1 ? source.length : newline
    } else if (ch === '"') {
      const { value, end } = readString(source, i)
      tokens.push({ type: 'string', value })
      i = end
    } else if (ch === '=' || ch === '{' || ch === '}') {
      tokens.push({ type: 'punct', value: ch })
      i++
    } else if (/[0-9]/.test(ch)) {
      const match = /^[0-9]+/.exec(source.slice(i))
      const digits = match ? match[0] : ch
      tokens.push({ type: 'number', value: Number(digits) })
      i += digits.length
    } else if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][\w-]*/.exec(source.slice(i))
      const ident = match ? match[0] : ch
      tokens.push({ type: 'ident', value: ident })
      i += ident.length
    } else {
      throw new PasswordPolicySyntaxError(`unexpected character '${ch}'`)
    }
  }

  return tokens
}

class TokenStream {
  private position = 0

  constructor(private readonly tokens: Token[]) {}

  get done(): boolean {
    return this.position >= this.tokens.length
  }

  next(): Token {
    const token = this.tokens[this.position++]
    if (!token) {
      throw new PasswordPolicySyntaxError('unexpected end of input')
    }
    return token
  }

  expectPunct(value: '=' | '{' | '}'): void {
    const token = this.next()
    if (token.type !== 'punct' || token.value !== value) {
      throw new PasswordPolicySyntaxError(`expected '${value}'`)
    }
  }
}

function parseRuleBody(stream: TokenStream): CharsetRule {
  let charset: string | undefined
  let minChars: number | undefined

  stream.expectPunct('{')
  for (;;) {
    const token = stream.next()
    if (token.type === 'punct' && token.value === '}') break
    if (token.type !== 'ident') {
      throw new PasswordPolicySyntaxError('expected attribute name in rule')
    }
    stream.expectPunct('=')
    const value = stream.next()

    if (token.value === 'charset' && value.type === 'string') {
      charset = value.value
    } else if (token.value === 'min-chars' && value.type === 'number') {
      minChars = value.value
    } else {
      throw new PasswordPolicySyntaxError(`unsupported rule attribute '${token.value}'`)
    }
  }

  if (!charset) {
    throw new PasswordPolicySyntaxError('charset rule without charset')
  }
  return minChars === undefined ? { charset } : { charset, minChars }
}

export function parsePasswordPolicy(source: string): PasswordPolicyParams {
  const stream = new TokenStream(tokenize(source))
  let length: number | undefined
  const rules: CharsetRule[] = []

  while (!stream.done) {
    const token = stream.next()
    if (token.type !== 'ident') {
      throw new PasswordPolicySyntaxError('expected attribute or block')
    }

    if (token.value === 'length') {
      stream.expectPunct('=')
      const value = stream.next()
      if (value.type !== 'number') {
        throw new PasswordPolicySyntaxError('length must be a number')
      }
      length = value.value
    } else if (token.value === 'rule') {
      const label = stream.next()
      if (label.type !== 'string' || label.value !== 'charset') {
        throw new PasswordPolicySyntaxError('only "charset" rules are supported')
      }
      rules.push(parseRuleBody(stream))
    } else {
      throw new PasswordPolicySyntaxError(`unsupported attribute '${token.value}'`)
    }
  }

  if (length === undefined) {
    throw new PasswordPolicySyntaxError('missing length')
  }
  return { length, rules }
}
