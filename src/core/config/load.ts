import { HarnessConfig, HarnessConfigInput } from '../types'
import { readFile, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import validateConfig from './validate'
import { ConfigLoadError } from './errors'

export const CONFIG_FILENAMES = ['joulebench.config.js', 'joulebench.config.cjs', 'joulebench.config.json']

function createDefaultConfig(): HarnessConfigInput {
  return {
    workloads: [],
    trials: 5,
    warmupDiscard: 1,
    timeout: 300000,
    buildConcurrency: 2,
  }
}

export interface LoadConfigOptions {
  cwd?: string
  configPath?: string
  envPrefix?: string
  cliArgs?: Record<string, unknown>
}

/**
 * Loads configuration from multiple sources with proper precedence:
 * 1. Default config (lowest priority)
 * 2. Config file (joulebench.config.{js,cjs,json})
 * 3. Environment variables
 * 4. CLI arguments (highest priority)
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<HarnessConfig> {
  const { cwd = process.cwd(), configPath, envPrefix = 'JOULEBENCH_', cliArgs = {} } = options

  let config: Record<string, unknown> = { ...createDefaultConfig() }

  const fileConfig = await loadConfigFile(cwd, configPath)
  if (fileConfig) {
    config = mergeConfig(config, fileConfig)
  }

  try {
    const envConfig = loadConfigFromEnv(envPrefix)
    if (Object.keys(envConfig).length > 0) {
      config = mergeConfig(config, envConfig)
    }
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to load config from environment: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error },
    )
  }

  if (Object.keys(cliArgs).length > 0) {
    config = mergeConfig(config, cliArgs)
  }

  return validateConfig(config)
}

/**
 * Loads configuration from a file, supporting JSON and CommonJS modules
 */
async function loadConfigFile(cwd: string, configPath?: string): Promise<Record<string, unknown> | null> {
  let targetPath: string | null = null

  if (configPath) {
    targetPath = resolve(cwd, configPath)
  } else {
    for (const filename of CONFIG_FILENAMES) {
      const filePath = join(cwd, filename)
      try {
        await access(filePath)
        targetPath = filePath
        break
      } catch {
        // File doesn't exist, continue searching
      }
    }
  }

  if (!targetPath) {
    return null
  }

  let loaded: unknown
  try {
    if (targetPath.endsWith('.json')) {
      const content = await readFile(targetPath, 'utf-8')
      loaded = JSON.parse(content)
    } else {
      const configModule: unknown = await import(targetPath)
      loaded = isRecord(configModule) && 'default' in configModule ? configModule.default : configModule
    }
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to load config file ${targetPath}: ${error instanceof Error ? error.message : String(error)}`,
      targetPath,
      { cause: error },
    )
  }

  if (!isRecord(loaded)) {
    throw new ConfigLoadError(`Config file ${targetPath} must export an object`, targetPath)
  }
  return loaded
}

function loadConfigFromEnv(prefix: string): Record<string, unknown> {
  const config: Record<string, unknown> = {}

  const envMappings = {
    [`${prefix}TRIALS`]: 'trials',
    [`${prefix}WARMUP_DISCARD`]: 'warmupDiscard',
    [`${prefix}TIMEOUT`]: 'timeout',
    [`${prefix}BUILD_TIMEOUT`]: 'buildTimeout',
    [`${prefix}BUILD_CONCURRENCY`]: 'buildConcurrency',
    [`${prefix}WORK_DIR`]: 'workDir',
    [`${prefix}COOLDOWN_MS`]: 'cooldownMs',
    [`${prefix}NICENESS`]: 'niceness',
    [`${prefix}SAMPLER`]: 'sampler.type',
    [`${prefix}POWERCAP_ROOT`]: 'sampler.root',
    [`${prefix}OUTPUT_DIR`]: 'output.dir',
    [`${prefix}OUTPUT_FORMATS`]: 'output.formats',
  }

  Object.entries(envMappings).forEach(([envVar, configPath]) => {
    const value = process.env[envVar]
    if (value !== undefined) {
      setNestedValue(config, configPath, parseEnvValue(value))
    }
  })

  return config
}

/**
 * Parses environment variable values to appropriate types
 */
function parseEnvValue(value: string): unknown {
  if (/^-?\d+(\.\d+)?$/.test(value)) {
    return Number(value)
  }

  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false
  if (value.startsWith('[') || value.startsWith('{')) {
    try {
      return JSON.parse(value)
    } catch {
      // Not JSON, keep the raw string
    }
  }

  return value
}

/**
 * Sets a nested value in an object using dot notation
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.')
  let current = obj

  for (let i = 0; i < keys.length - 1; i++) {
    const key = keys[i]
    if (!key) continue

    const next = current[key]
    if (isRecord(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[key] = created
      current = created
    }
  }

  const finalKey = keys[keys.length - 1]
  if (finalKey) {
    current[finalKey] = value
  }
}

/**
 * Deep merges two configuration objects, with the second taking precedence
 */
function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base }

  Object.entries(override).forEach(([key, value]) => {
    if (value === undefined) return

    const existing = result[key]
    if (isRecord(existing) && isRecord(value)) {
      result[key] = mergeConfig(existing, value)
    } else {
      result[key] = value
    }
  })

  return result
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
