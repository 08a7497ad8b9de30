/**
 * `loom config` command group
 *
 * Subcommands:
 *   - `loom config show`                 display merged config (credentials masked)
 *   - `loom config get <key>`            print one value by dot-notation key
 *   - `loom config set <key> <value>`    update a project config value
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { ConfigError } from '../../core/errors.js'
import { coerceScalar, createConfigSystem, getByPath } from '../../modules/config/config-system-impl.js'
import type { ConfigSource, ConfigSystem } from '../../modules/config/config-system.js'
import { createLogger } from '../../utils/logger.js'
import { projectConfigDir } from '../utils/engine.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export interface ConfigCommandOptions {
  /** Directory containing .storyloom/ (default: cwd) */
  projectRoot?: string
  /** Global .storyloom/ directory (default: ~/.storyloom) */
  globalConfigDir?: string
}

/** Build and load the config system; returns an exit code on failure */
async function loadConfig(opts: ConfigCommandOptions): Promise<ConfigSystem | number> {
  const system = createConfigSystem({
    projectConfigDir: projectConfigDir(opts),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
  })

  try {
    await system.load()
    return system
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigCommandOptions {
  format?: 'yaml' | 'json'
}

/** Trailing yaml comment naming the layers that were merged */
export function renderSources(sources: ConfigSource[]): string {
  const lines = sources.map((source) => `#   ${source.layer}${source.detail === null ? '' : ` ${source.detail}`}`)
  return `\n# Sources:\n${lines.join('\n')}\n`
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const system = await loadConfig(opts)
  if (typeof system === 'number') return system

  const masked = system.getMasked()
  if (opts.format === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# StoryLoom configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
    process.stdout.write(renderSources(system.getSources()))
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigCommandOptions = {}): Promise<number> {
  const system = await loadConfig(opts)
  if (typeof system === 'number') return system

  const value = getByPath(system.getMasked(), key)
  if (value === undefined) {
    process.stderr.write(`  Error: Unknown config key: ${key}\n`)
    return CONFIG_EXIT_INVALID
  }
  if (typeof value === 'object' && value !== null) {
    process.stdout.write(yaml.dump(value))
  } else {
    process.stdout.write(`${String(value)}\n`)
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config set` action
// ---------------------------------------------------------------------------

export async function runConfigSet(key: string, rawValue: string, opts: ConfigCommandOptions = {}): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('  Error: key must not be empty\n')
    return CONFIG_EXIT_INVALID
  }

  const system = await loadConfig(opts)
  if (typeof system === 'number') return system

  const value = coerceScalar(rawValue.trim())
  try {
    await system.set(key, value)
    process.stdout.write(`  Set ${key} = ${JSON.stringify(value)}\n`)
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err, key }, 'Failed to update configuration')
    process.stderr.write(`  Error updating configuration: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

function sourceOptions(opts: ConfigCommandOptions): ConfigCommandOptions {
  return {
    ...(opts.projectRoot !== undefined && { projectRoot: opts.projectRoot }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
  }
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('Show and modify StoryLoom configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration (credentials masked)')
    .option('--output-format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-root <dir>', 'Directory containing .storyloom/')
    .option('--global-config-dir <dir>', 'Path to global .storyloom/ directory')
    .action(async (opts: ConfigCommandOptions & { outputFormat: string }) => {
      const exitCode = await runConfigShow({
        ...sourceOptions(opts),
        format: opts.outputFormat === 'json' ? 'json' : 'yaml',
      })
      process.exit(exitCode)
    })

  configCmd
    .command('get <key>')
    .description('Print a configuration value by dot-notation key (e.g. global.log_level)')
    .option('--project-root <dir>', 'Directory containing .storyloom/')
    .option('--global-config-dir <dir>', 'Path to global .storyloom/ directory')
    .action(async (key: string, opts: ConfigCommandOptions) => {
      const exitCode = await runConfigGet(key, sourceOptions(opts))
      process.exit(exitCode)
    })

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value using dot-notation (e.g. routing.default_provider scripted)')
    .option('--project-root <dir>', 'Directory containing .storyloom/')
    .option('--global-config-dir <dir>', 'Path to global .storyloom/ directory')
    .action(async (key: string, value: string, opts: ConfigCommandOptions) => {
      const exitCode = await runConfigSet(key, value, sourceOptions(opts))
      process.exit(exitCode)
    })
}
