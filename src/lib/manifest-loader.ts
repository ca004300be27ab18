/**
 * Manifest file discovery
 *
 * Resolves `-f` arguments (files, directories, globs or `-` for stdin) to
 * manifest files and parses them in a stable order.
 */

import fs from 'node:fs'
import path from 'node:path'
import { glob } from 'tinyglobby'
import { parseManifest } from '../domain/manifest.js'
import type { Resource } from '../domain/types.js'
import { NoManifestsError } from './errors.js'

export const STDIN_SOURCE = '-'
const MANIFEST_EXTENSIONS = '{yaml,yml}'

export interface LoadManifestsOptions {
  /** Descend into sub-directories of directory arguments */
  recursive?: boolean
  cwd?: string
  /** Reader for `-`; defaults to process.stdin */
  readStdin?: () => Promise<string>
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString('utf-8')
}

function toGlob(pattern: string, cwd: string, recursive: boolean): string {
  const absolute = path.resolve(cwd, pattern)
  if (fs.existsSync(absolute) && fs.statSync(absolute).isDirectory()) {
    const dir = path.relative(cwd, absolute) || '.'
    return path.posix.join(dir.split(path.sep).join('/'), recursive ? '**' : '', `*.${MANIFEST_EXTENSIONS}`)
  }
  return pattern
}

/**
 * Expand patterns to a sorted, de-duplicated list of manifest files
 */
export async function findManifests(patterns: string[], options: LoadManifestsOptions = {}): Promise<string[]> {
  const cwd = options.cwd ?? process.cwd()
  const globs = patterns
    .filter(pattern => pattern !== STDIN_SOURCE)
    .map(pattern => toGlob(pattern, cwd, options.recursive ?? false))

  if (globs.length === 0) {
    return []
  }

  const files = await glob(globs, { cwd, absolute: true, onlyFiles: true })
  return [...new Set(files)].sort()
}

/**
 * Load and parse every manifest named by `patterns`.
 *
 * @throws NoManifestsError when nothing matches
 * @throws ManifestParseError for the first undecodable document
 */
export async function loadManifests(patterns: string[], options: LoadManifestsOptions = {}): Promise<Resource[]> {
  const resources: Resource[] = []

  if (patterns.includes(STDIN_SOURCE)) {
    const text = await (options.readStdin ?? readProcessStdin)()
    resources.push(...parseManifest(text, '<stdin>'))
  }

  const files = await findManifests(patterns, options)
  if (files.length === 0 && !patterns.includes(STDIN_SOURCE)) {
    throw new NoManifestsError(patterns)
  }

  for (const file of files) {
    const text = await fs.promises.readFile(file, 'utf-8')
    resources.push(...parseManifest(text, path.relative(options.cwd ?? process.cwd(), file) || file))
  }

  return resources
}
