/**
 * Vaultsmith Config Loader
 *
 * Loads and merges configuration from .vaultsmith/config.yaml files
 * with support for inheritance via "extends" field.
 *
 * Resolution order (later wins):
 *   defaults <- extended configs <- config.yaml <- config.local.yaml <- VAULT_* environment
 */

import fs from 'node:fs'
import path from 'node:path'
import dotenv from 'dotenv'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { normalizePath } from '../domain/types.js'
import {
  CircularExtendsError,
  ConfigNotFoundError,
  ExtendsDepthError,
  InvalidConfigError
} from './errors.js'
import {
  DEFAULT_KUBERNETES_JWT_PATH,
  DEFAULT_STORAGE,
  type VaultsmithConfig
} from '../types.js'

export const CONFIG_DIR = '.vaultsmith'
const CONFIG_FILE = 'config.yaml'
const CONFIG_LOCAL_FILE = 'config.local.yaml'
const ENV_FILE = '.env'
const MAX_SEARCH_DEPTH = 5
const MAX_EXTENDS_DEPTH = 10

export type EnvMap = Record<string, string | undefined>

type RawConfig = Record<string, unknown>

const storagePathSchema = z.string().transform(normalizePath).pipe(z.string().min(1))

export const ConfigSchema: z.ZodType<VaultsmithConfig, z.ZodTypeDef, unknown> = z.object({
  extends: z.string().optional(),
  baseUrl: z.string().url(),
  namespace: z.string().min(1).optional(),
  auth: z.discriminatedUnion('method', [
    z.object({
      method: z.literal('token'),
      token: z.string().min(1, 'token is required (set VAULT_TOKEN)')
    }),
    z.object({
      method: z.literal('kubernetes'),
      mountPath: storagePathSchema.default('kubernetes'),
      role: z.string().min(1),
      jwtPath: z.string().min(1).default(DEFAULT_KUBERNETES_JWT_PATH)
    })
  ]),
  storage: z.object({
    secretsEnginePath: storagePathSchema.default(DEFAULT_STORAGE.secretsEnginePath),
    snapshotsPath: storagePathSchema.default(DEFAULT_STORAGE.snapshotsPath)
  }).default({}),
  concurrency: z.coerce.number().int().min(1).max(64).default(8),
  timeoutMs: z.coerce.number().int().positive().default(30_000),
  retries: z.coerce.number().int().min(0).max(10).default(0)
})

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: EnvMap = process.env): string {
  return str
    .replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, name: string, fallback: string) => env[name] || fallback)
    .replace(/\$\{([^}]+)\}/g, (_, name: string) => env[name] || '')
    .replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, name: string) => env[name] || '')
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsInValue(value: unknown, env: EnvMap): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value, env)
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item, env))
  }
  if (isRecord(value)) {
    const result: RawConfig = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item, env)
    }
    return result
  }
  return value
}

/**
 * Find the .vaultsmith directory by searching up from the current directory
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)

  for (let depth = 0; depth < MAX_SEARCH_DEPTH; depth++) {
    const configDir = path.join(currentDir, CONFIG_DIR)
    if (fs.existsSync(path.join(configDir, CONFIG_FILE))) {
      return configDir
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached root
      break
    }
    currentDir = parentDir
  }

  return null
}

/**
 * Load a single config file
 */
function loadConfigFile(configPath: string, env: EnvMap, required: boolean = true): RawConfig {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new ConfigNotFoundError(configPath)
    }
    return {}
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (error) {
    throw new InvalidConfigError(
      error instanceof Error ? error.message : String(error),
      configPath,
      error instanceof Error ? error : undefined
    )
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }
  if (!isRecord(parsed)) {
    throw new InvalidConfigError('expected a mapping at the top level', configPath)
  }

  const expanded = expandEnvVarsInValue(parsed, env)
  return isRecord(expanded) ? expanded : {}
}

/**
 * Deep merge two config objects; arrays and scalars from `source` replace those in `target`
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key]
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue)
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue
    }
  }

  return result
}

/**
 * Load config with inheritance support
 */
function loadConfigWithExtends(
  configPath: string,
  env: EnvMap,
  visited: Set<string> = new Set(),
  depth: number = 0
): RawConfig {
  if (depth > MAX_EXTENDS_DEPTH) {
    throw new ExtendsDepthError(MAX_EXTENDS_DEPTH)
  }

  const absolutePath = path.resolve(configPath)
  if (visited.has(absolutePath)) {
    throw new CircularExtendsError(absolutePath)
  }
  visited.add(absolutePath)

  const { extends: parent, ...config } = loadConfigFile(absolutePath, env)
  if (typeof parent !== 'string') {
    return config
  }

  const parentPath = path.resolve(path.dirname(absolutePath), parent)
  return deepMerge(loadConfigWithExtends(parentPath, env, visited, depth + 1), config)
}

/**
 * Read KEY=value pairs from a .env file without touching process.env
 */
function loadDotenv(dir: string): EnvMap {
  const envPath = path.join(dir, ENV_FILE)
  if (!fs.existsSync(envPath)) {
    return {}
  }
  return dotenv.parse(fs.readFileSync(envPath))
}

/**
 * Apply VAULT_ADDR, VAULT_TOKEN, VAULT_NAMESPACE and VAULTSMITH_CONCURRENCY
 */
function applyEnvOverrides(config: RawConfig, env: EnvMap): RawConfig {
  const result: RawConfig = { ...config }

  if (env.VAULT_ADDR) {
    result.baseUrl = env.VAULT_ADDR
  }
  if (env.VAULT_NAMESPACE) {
    result.namespace = env.VAULT_NAMESPACE
  }
  if (env.VAULTSMITH_CONCURRENCY) {
    result.concurrency = env.VAULTSMITH_CONCURRENCY
  }

  // VAULT_TOKEN never replaces another auth method
  const auth = isRecord(result.auth) ? result.auth : undefined
  if (env.VAULT_TOKEN && (!auth || auth.method === 'token')) {
    result.auth = { method: 'token', token: env.VAULT_TOKEN }
  }

  return result
}

export interface LoadConfigOptions {
  /** Directory to start searching from */
  cwd?: string
  /** Explicit config file; must exist */
  configPath?: string
  /** Environment; defaults to process.env */
  env?: EnvMap
}

/**
 * Load configuration from the nearest .vaultsmith/config.yaml
 * Also merges config.local.yaml if it exists (for secrets/overrides)
 */
export function loadConfig(options: LoadConfigOptions = {}): VaultsmithConfig {
  const cwd = options.cwd ?? process.cwd()
  const configPath = options.configPath ? path.resolve(cwd, options.configPath) : undefined
  const configDir = configPath ? path.dirname(configPath) : findConfigDir(cwd)
  const projectDir = configDir ? path.dirname(configDir) : cwd

  // Real environment wins over .env
  const env: EnvMap = { ...loadDotenv(projectDir), ...(options.env ?? process.env) }

  let raw: RawConfig = {}
  const mainPath = configPath ?? (configDir ? path.join(configDir, CONFIG_FILE) : undefined)

  if (mainPath) {
    if (!fs.existsSync(mainPath)) {
      throw new ConfigNotFoundError(mainPath)
    }
    raw = loadConfigWithExtends(mainPath, env)
  }
  if (configDir) {
    raw = deepMerge(raw, loadConfigFile(path.join(configDir, CONFIG_LOCAL_FILE), env, false))
  }

  const result = ConfigSchema.safeParse(applyEnvOverrides(raw, env))
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    throw new InvalidConfigError(issues.join('; '), mainPath)
  }

  return result.data
}

/**
 * Check if a config directory exists
 */
export function configExists(startDir?: string): boolean {
  return findConfigDir(startDir) !== null
}
