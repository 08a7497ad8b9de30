/**
 * Configuration contract. Implementations live in config-system-impl.ts;
 * callers obtain one through `createConfigSystem()`.
 */

import type { LoomConfig, PartialLoomConfig } from './config-schema.js'

export interface ConfigSystemOptions {
  /** Project .storyloom/ directory (default: <cwd>/.storyloom) */
  projectConfigDir?: string
  /** User .storyloom/ directory (default: ~/.storyloom) */
  globalConfigDir?: string
  /** Highest-priority layer, usually built from command-line flags */
  cliOverrides?: PartialLoomConfig
  /** Where LOOM_* overrides are read from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

/** Layers, lowest priority first */
export type ConfigLayer = 'defaults' | 'global' | 'project' | 'env' | 'cli'

/** One layer that contributed to the loaded configuration */
export interface ConfigSource {
  layer: ConfigLayer
  /** File path for file layers, comma-separated variable names for env, else null */
  detail: string | null
}

/**
 * Validated configuration merged from
 * defaults < global file < project file < LOOM_* env < CLI overrides.
 */
export interface ConfigSystem {
  load(): Promise<void>

  /** @throws {ConfigError} before load() */
  getConfig(): LoomConfig

  /** Value at a dot-notation key such as "context.token_budget"; undefined if absent */
  get(key: string): unknown

  /**
   * Write one scalar into the project file, then reload.
   * @throws {ConfigError} for an unknown or object key, or a value the schema refuses
   */
  set(key: string, value: unknown): Promise<void>

  /** Credential-looking values replaced, for display */
  getMasked(): LoomConfig

  /**
   * Layers that contributed to the last load(), lowest priority first.
   * @throws {ConfigError} before load()
   */
  getSources(): ConfigSource[]

  readonly isLoaded: boolean
}
