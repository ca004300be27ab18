/**
 * Password generation from a password policy
 *
 * Every charset rule contributes at least `minChars` characters; the rest are
 * drawn from the union of all charsets. Uses the CSPRNG from node:crypto.
 */

import { randomInt } from 'node:crypto'
import type { PasswordPolicyParams } from '../domain/types.js'
import { VaultsmithError } from './errors.js'

function uniqueChars(charset: string): string[] {
  return [...new Set(Array.from(charset))]
}

function pick(chars: readonly string[]): string {
  return chars[randomInt(chars.length)]
}

export function generatePassword(policy: PasswordPolicyParams): string {
  const required = policy.rules.reduce((sum, rule) => sum + (rule.minChars ?? 0), 0)
  if (required > policy.length) {
    throw new VaultsmithError(
      `Password policy requires ${required} characters but length is ${policy.length}`,
      'PASSWORD_POLICY_UNSATISFIABLE'
    )
  }

  const pool = uniqueChars(policy.rules.map(rule => rule.charset).join(''))
  if (pool.length === 0) {
    throw new VaultsmithError('Password policy has no characters to draw from', 'PASSWORD_POLICY_UNSATISFIABLE')
  }

  const chars: string[] = []
  for (const rule of policy.rules) {
    const charset = uniqueChars(rule.charset)
    for (let i = 0; i < (rule.minChars ?? 0); i++) {
      chars.push(pick(charset))
    }
  }
  while (chars.length < policy.length) {
    chars.push(pick(pool))
  }

  // Fisher-Yates
  for (let i = chars.length - 1; i > 0; i--) {
    const j = randomInt(i + 1)
    const tmp = chars[i]
    chars[i] = chars[j]
    chars[j] = tmp
  }

  return chars.join('')
}
