/**
 * netdeploy Config Loader
 *
 * Loads .netdeploy/config.yaml (plus config.local.yaml overrides) and merges
 * it over the defaults.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { NetdeployConfig, TimeoutConfig } from '../types.js'
import { ConfigNotFoundError, InvalidConfigError, errorMessage } from './errors.js'
import { isPlainObject, type PlainObject } from './values.js'

const CONFIG_DIR = '.netdeploy'
const CONFIG_FILE = 'config.yaml'
const CONFIG_LOCAL_FILE = 'config.local.yaml'
const MAX_SEARCH_DEPTH = 5

export interface LoadedConfig {
  config: NetdeployConfig
  /** Absolute path of the .netdeploy directory */
  configDir: string
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: NetdeployConfig = {
  version: '1',
  inventory: 'inventory.yaml',
  intended: {
    dir: 'intended',
    filename: '{name}.cfg'
  },
  credentials: {
    default_username: 'admin',
    default_password: 'admin'
  },
  timeouts: {
    open: 30000,
    stage: 60000,
    diff: 30000,
    commit: 120000,
    discard: 30000,
    facts: 30000,
    close: 10000
  },
  concurrency: 4,
  verify_facts: true
}

const TIMEOUT_KEYS: ReadonlyArray<keyof TimeoutConfig> = [
  'open', 'stage', 'diff', 'commit', 'discard', 'facts', 'close'
]

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsInValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value)
  }

  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item))
  }

  if (isPlainObject(value)) {
    const result: PlainObject = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item)
    }
    return result
  }

  return value
}

/**
 * Find the .netdeploy directory by searching up from the current directory
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
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
    depth++
  }

  return null
}

/**
 * Load a single YAML file into a plain object
 */
function loadConfigFile(configPath: string, required: boolean = true): PlainObject {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new InvalidConfigError('file does not exist', configPath)
    }
    return {}
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new InvalidConfigError(errorMessage(err), configPath, err)
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }
  if (!isPlainObject(parsed)) {
    throw new InvalidConfigError('top level must be a mapping', configPath)
  }

  const expanded = expandEnvVarsInValue(parsed)
  return isPlainObject(expanded) ? expanded : {}
}

/**
 * Deep merge two plain objects, source wins
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key]

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue)
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue
    }
  }

  return result
}

/**
 * Validate a merged raw config into NetdeployConfig
 */
export function normalizeConfig(raw: PlainObject, configPath?: string): NetdeployConfig {
  const fail = (message: string): never => {
    throw new InvalidConfigError(message, configPath)
  }

  const str = (value: unknown, field: string): string => {
    if (typeof value !== 'string' || value.trim() === '') {
      return fail(`"${field}" must be a non-empty string`)
    }
    return value
  }

  const num = (value: unknown, field: string): number => {
    const parsed = typeof value === 'string' ? Number(value) : value
    if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) {
      return fail(`"${field}" must be a non-negative number`)
    }
    return parsed
  }

  const bool = (value: unknown, field: string): boolean => {
    if (typeof value === 'boolean') return value
    if (value === 'true') return true
    if (value === 'false') return false
    return fail(`"${field}" must be true or false`)
  }

  const section = (value: unknown, field: string): PlainObject =>
    isPlainObject(value) ? value : fail(`"${field}" must be a mapping`)

  const version = raw.version === undefined ? '1' : String(raw.version)
  if (version !== '1') {
    fail(`unsupported version "${version}"`)
  }

  const intended = section(raw.intended, 'intended')
  const credentials = section(raw.credentials, 'credentials')
  const timeouts = section(raw.timeouts, 'timeouts')

  const timeoutConfig: TimeoutConfig = { ...DEFAULT_CONFIG.timeouts }
  for (const key of TIMEOUT_KEYS) {
    timeoutConfig[key] = num(timeouts[key], `timeouts.${key}`)
  }

  const concurrency = num(raw.concurrency, 'concurrency')
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    fail('"concurrency" must be a positive integer')
  }

  return {
    version: '1',
    inventory: str(raw.inventory, 'inventory'),
    intended: {
      dir: str(intended.dir, 'intended.dir'),
      filename: str(intended.filename, 'intended.filename')
    },
    credentials: {
      default_username: str(credentials.default_username, 'credentials.default_username'),
      default_password: str(credentials.default_password, 'credentials.default_password')
    },
    timeouts: timeoutConfig,
    concurrency,
    verify_facts: bool(raw.verify_facts, 'verify_facts')
  }
}

function defaultsAsObject(): PlainObject {
  return {
    ...DEFAULT_CONFIG,
    intended: { ...DEFAULT_CONFIG.intended },
    credentials: { ...DEFAULT_CONFIG.credentials },
    timeouts: { ...DEFAULT_CONFIG.timeouts }
  }
}

/**
 * Load configuration from the nearest .netdeploy/config.yaml
 * Also merges config.local.yaml if it exists (for credentials that shouldn't be committed)
 */
export function loadConfig(startDir?: string): LoadedConfig {
  const configDir = findConfigDir(startDir)

  if (!configDir) {
    throw new ConfigNotFoundError(path.resolve(startDir ?? process.cwd()))
  }

  const configPath = path.join(configDir, CONFIG_FILE)
  let raw = deepMerge(defaultsAsObject(), loadConfigFile(configPath))

  const localConfig = loadConfigFile(path.join(configDir, CONFIG_LOCAL_FILE), false)
  if (Object.keys(localConfig).length > 0) {
    raw = deepMerge(raw, localConfig)
  }

  return {
    config: normalizeConfig(raw, configPath),
    configDir
  }
}

/**
 * Resolve a path from the config relative to the .netdeploy directory
 */
export function resolveConfigPath(configDir: string, relative: string): string {
  return path.resolve(configDir, relative)
}
