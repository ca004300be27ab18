/**
 * Value encodings for secrets written to KV
 */

import type { StringEncoding } from '../domain/types.js'

export function encodeValue(value: string, encoding: StringEncoding): string {
  return encoding === 'base64' ? Buffer.from(value, 'utf8').toString('base64') : value
}
