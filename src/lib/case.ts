/**
 * Key case conversion from manifest (camelCase) to Vault API (snake_case) field names
 */

export function camelToSnake(key: string): string {
  return key.replace(/[A-Z]/g, letter => `_${letter.toLowerCase()}`)
}

/**
 * Shallow-convert the keys of an object to snake_case, dropping undefined values
 */
export function toSnakeKeys(input: object): Record<string, unknown> {
  const output: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      output[camelToSnake(key)] = value
    }
  }
  return output
}
