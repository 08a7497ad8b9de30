/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/set/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.storyloom/config.yaml)
 *     → project config      (./.storyloom/config.yaml)
 *     → environment vars    (LOOM_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import type { ZodIssue } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { ConfigError } from '../../core/errors.js'
import { deepMask } from '../../utils/masking.js'
import { isPlainObject } from '../../utils/helpers.js'
import {
  LoomConfigSchema,
  PartialLoomConfigSchema,
  type LoomConfig,
  type PartialLoomConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSource, ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

/** Directory name used for both the global and the project config */
export const CONFIG_DIR_NAME = '.storyloom'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of LOOM_ environment variable names to config paths.
 * Only scalar values can be overridden from the environment.
 */
export const ENV_VAR_MAP: Readonly<Record<string, string>> = {
  LOOM_LOG_LEVEL: 'global.log_level',
  LOOM_MAX_CONCURRENT_GENERATIONS: 'global.max_concurrent_generations',
  LOOM_DEFAULT_PROVIDER: 'routing.default_provider',
  LOOM_CONTEXT_TOKEN_BUDGET: 'context.token_budget',
  LOOM_ATTEMPT_TIMEOUT_MS: 'generation.attempt_timeout_ms',
  LOOM_BACKOFF_BASE_MS: 'generation.backoff_base_ms',
}

/** Coerce a raw string from the environment or the command line */
export function coerceScalar(raw: string): unknown {
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (/^-?\d+$/.test(raw)) return parseInt(raw, 10)
  if (/^-?\d*\.\d+$/.test(raw)) return parseFloat(raw)
  return raw
}

interface EnvOverrides {
  overrides: PartialLoomConfig
  /** Names of the variables that were applied */
  variables: string[]
}

/**
 * Overlay built from the LOOM_* variables that are set. An overlay the
 * schema refuses is dropped as a whole.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): EnvOverrides {
  let overrides: Record<string, unknown> = {}
  const variables: string[] = []

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides = setByPath(overrides, configPath, coerceScalar(rawValue))
    variables.push(envKey)
  }

  const parsed = PartialLoomConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues, variables }, 'Invalid environment variable overrides ignored')
    return { overrides: {}, variables: [] }
  }
  return { overrides: parsed.data, variables }
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
export function setByPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown,
): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined || head === '') return obj
  if (rest.length === 0) return { ...obj, [head]: value }
  const child = obj[head]
  return { ...obj, [head]: setByPath(isPlainObject(child) ? child : {}, rest.join('.'), value) }
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: LoomConfig | null = null
  private _sources: ConfigSource[] = []
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialLoomConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), CONFIG_DIR_NAME)
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), CONFIG_DIR_NAME)
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)
    const sources: ConfigSource[] = [{ layer: 'defaults', detail: null }]

    const globalPath = join(this._globalConfigDir, 'config.yaml')
    const globalConfig = await this._loadYamlFile(globalPath)
    if (globalConfig !== null) {
      merged = deepMerge(merged, globalConfig)
      sources.push({ layer: 'global', detail: globalPath })
    }

    const projectPath = join(this._projectConfigDir, 'config.yaml')
    const projectConfig = await this._loadYamlFile(projectPath)
    if (projectConfig !== null) {
      merged = deepMerge(merged, projectConfig)
      sources.push({ layer: 'project', detail: projectPath })
    }

    const env = readEnvOverrides(this._env)
    if (env.variables.length > 0) {
      merged = deepMerge(merged, env.overrides)
      sources.push({ layer: 'env', detail: env.variables.join(', ') })
    }

    if (Object.keys(this._cliOverrides).length > 0) {
      merged = deepMerge(merged, this._cliOverrides)
      sources.push({ layer: 'cli', detail: null })
    }

    const result = LoomConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    this._sources = sources
    logger.debug({ sources: sources.map((source) => source.layer) }, 'Configuration loaded')
  }

  getConfig(): LoomConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)

    if (existing === undefined) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }
    if (typeof existing === 'object' && existing !== null) {
      throw new ConfigError(`Cannot set object key "${key}"; use a more specific dot-notation path`, {
        key,
      })
    }

    const projectConfigPath = join(this._projectConfigDir, 'config.yaml')
    const projectConfigRaw: Record<string, unknown> =
      (await this._loadYamlFile(projectConfigPath)) ?? {}
    const updated = setByPath(projectConfigRaw, key, value)

    const partial = PartialLoomConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(`Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`, {
        key,
        value,
        issues: partial.error.issues,
      })
    }
    // The merged document must still validate (e.g. cardinality min <= max)
    const candidate = LoomConfigSchema.safeParse(deepMerge(structuredClone(this.getConfig()), updated))
    if (!candidate.success) {
      throw new ConfigError(`Invalid value for "${key}":\n${formatIssues(candidate.error.issues)}`, {
        key,
        value,
        issues: candidate.error.issues,
      })
    }

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(projectConfigPath, yaml.dump(updated), 'utf-8')
    await this.load()
  }

  getSources(): ConfigSource[] {
    this.getConfig()
    return [...this._sources]
  }

  getMasked(): LoomConfig {
    const masked = LoomConfigSchema.safeParse(deepMask(this.getConfig()))
    return masked.success ? masked.data : this.getConfig()
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialLoomConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      parsed = yaml.load(await readFile(filePath, 'utf-8'))
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }
    if (parsed === undefined || parsed === null) return {}

    const version = isPlainObject(parsed) ? parsed['config_format_version'] : undefined
    if (version !== undefined && version !== '1') {
      throw new ConfigError(
        `Unsupported config_format_version "${String(version)}" in ${filePath}; supported: 1`,
        { filePath, version },
      )
    }

    const result = PartialLoomConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
