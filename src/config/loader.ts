import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { StratumConfigSchema, type StratumConfig } from '../types/config.js'
import { DEFAULT_CONFIG } from './defaults.js'

/** Default configuration file name, resolved against the working directory. */
export const CONFIG_FILE = 'stratum.config.json'

const ENV_PREFIX = 'STRATUM_'

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge source into target. Source values override target values.
 * Arrays from source replace target arrays (no concatenation).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target }
  for (const key of Object.keys(source)) {
    const sourceVal = source[key]
    const targetVal = result[key]
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal)
    } else {
      result[key] = sourceVal
    }
  }
  return result
}

/**
 * Find the actual key in an object that matches the given key case-insensitively.
 * Returns the original-cased key if found, or the input key if no match exists.
 */
function findCaseInsensitiveKey(obj: Record<string, unknown>, key: string): string {
  const lowerKey = key.toLowerCase()
  for (const k of Object.keys(obj)) {
    if (k.toLowerCase() === lowerKey) return k
  }
  return key
}

/**
 * Set a nested value in an object using a path array.
 * Resolves each path segment case-insensitively against existing keys.
 */
function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj
  for (let i = 0; i < path.length - 1; i++) {
    const resolvedKey = findCaseInsensitiveKey(current, path[i])
    const next = current[resolvedKey]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[resolvedKey] = created
      current = created
    }
  }
  const finalKey = findCaseInsensitiveKey(current, path[path.length - 1])
  current[finalKey] = value
}

/**
 * Apply STRATUM_ prefixed environment variable overrides to config.
 * Double underscores (__) indicate nested paths:
 *   STRATUM_STORE__PATH=/tmp/a.db -> config.store.path = '/tmp/a.db'
 * Values stay strings here; Value.Convert coerces them against the schema.
 */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue
    const path = key.slice(ENV_PREFIX.length).toLowerCase().split('__')
    setNestedValue(config, path, value)
  }
  return config
}

/**
 * Recursively freeze an object and all nested objects.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj)
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return obj
}

/** Read the user's config file; a missing file contributes nothing. */
function readUserConfig(configPath: string): Record<string, unknown> {
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      return {}
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }
  return parsed
}

/**
 * Load, validate, and return a frozen StratumConfig.
 *
 * Pipeline: read file (optional) -> parse JSON -> merge defaults
 *           -> apply env overrides -> convert -> validate -> freeze
 *
 * @param configPath - Path to stratum.config.json
 * @param env - Environment to read STRATUM_ overrides from
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath: string = CONFIG_FILE, env: NodeJS.ProcessEnv = process.env): StratumConfig {
  const userConfig = readUserConfig(configPath)

  // Deep clone so the defaults object is never shared with the result
  const merged: unknown = JSON.parse(JSON.stringify(deepMerge({ ...DEFAULT_CONFIG }, userConfig)))
  if (!isPlainObject(merged)) {
    throw new ConfigError(`Configuration invalid: ${configPath}`)
  }

  const config = Value.Convert(StratumConfigSchema, applyEnvOverrides(merged, env))

  if (!Value.Check(StratumConfigSchema, config)) {
    const fields = [...Value.Errors(StratumConfigSchema, config)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  return deepFreeze(config)
}
