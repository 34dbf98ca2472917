import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { CedulaConfigSchema, type CedulaConfig } from '../types/config.js'
import { DEFAULT_CONFIG } from './defaults.js'

export const ENV_PREFIX = 'CEDULA_'

type ConfigObject = Record<string, unknown>

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

function isPlainObject(value: unknown): value is ConfigObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Merge `source` over a copy of `target`. Nested objects merge key by key;
 * every other value (arrays included) replaces what was there.
 */
function mergeConfig(target: ConfigObject, source: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...target }
  for (const [key, value] of Object.entries(source)) {
    const existing = result[key]
    result[key] = isPlainObject(value) && isPlainObject(existing)
      ? mergeConfig(existing, value)
      : value
  }
  return result
}

/** Environment values are strings; turn numbers and booleans into their types. */
function coerceEnvValue(value: string): string | number | boolean {
  const lower = value.toLowerCase()
  if (lower === 'true') return true
  if (lower === 'false') return false
  if (/^\d+(\.\d+)?$/.test(value)) return Number(value)
  return value
}

/** Match `key` against existing keys ignoring case; env names are upper-cased. */
function resolveKey(obj: ConfigObject, key: string): string {
  return Object.keys(obj).find((k) => k.toLowerCase() === key.toLowerCase()) ?? key
}

/**
 * Apply CEDULA_ prefixed environment variable overrides.
 * Double underscores (__) separate nested keys:
 *   CEDULA_DGII__TIMEOUTMS=5000 -> config.dgii.timeoutMs = 5000
 */
function applyEnvOverrides(config: ConfigObject, env: NodeJS.ProcessEnv): ConfigObject {
  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || value === undefined) continue
    const path = name.slice(ENV_PREFIX.length).toLowerCase().split('__')
    const last = path.pop()
    if (!last) continue

    let current = config
    for (const segment of path) {
      const key = resolveKey(current, segment)
      const next = current[key]
      if (isPlainObject(next)) {
        current = next
      } else {
        const created: ConfigObject = {}
        current[key] = created
        current = created
      }
    }
    current[resolveKey(current, last)] = coerceEnvValue(value)
  }
  return config
}

function readConfigFile(configPath: string): ConfigObject {
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
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
 * Load, validate, and return a frozen CedulaConfig.
 *
 * Pipeline: read file (if given) -> merge over defaults -> apply env
 *           overrides -> validate against TypeBox schema -> freeze
 *
 * @param configPath - Path to cedula.config.json; without one only defaults
 *   and environment overrides apply
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): CedulaConfig {
  const userConfig = configPath === undefined ? {} : readConfigFile(configPath)

  // structuredClone keeps DEFAULT_CONFIG untouched by env overrides
  const merged = applyEnvOverrides(mergeConfig(structuredClone(DEFAULT_CONFIG), userConfig), env)

  if (!Value.Check(CedulaConfigSchema, merged)) {
    const fields = [...Value.Errors(CedulaConfigSchema, merged)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  Object.freeze(merged.dgii)
  return Object.freeze(merged)
}
