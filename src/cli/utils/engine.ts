/**
 * Shared plumbing for commands that drive the engine: locating the project,
 * opening the orchestrator, argument parsing and exit codes.
 */

import { existsSync } from 'node:fs'
import { join, resolve } from 'node:path'
import { ConfigError, LoomError, RequestError } from '../../core/errors.js'
import { createOrchestrator } from '../../core/orchestrator-impl.js'
import type { Orchestrator } from '../../core/orchestrator.js'
import { parseRef } from '../../core/types.js'
import type { EntityRef } from '../../core/types.js'
import { CONFIG_DIR_NAME, createConfigSystem } from '../../modules/config/config-system-impl.js'
import { createLogger, setLogLevel } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'

const logger = createLogger('cli')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE = 2

/** Error codes caused by what the caller asked for rather than by the system */
const USAGE_ERROR_CODES: ReadonlySet<string> = new Set([
  'INVALID_REQUEST',
  'NOT_FOUND',
  'CONFLICT',
  'ILLEGAL_TRANSITION',
  'CONTEXT_ERROR',
  'SCOPE_ERROR',
  'CONFIG_ERROR',
])

export function exitCodeFor(err: unknown): number {
  return err instanceof LoomError && USAGE_ERROR_CODES.has(err.code) ? EXIT_USAGE : EXIT_ERROR
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export type OutputFormat = 'human' | 'json'

export function parseOutputFormat(value: string): OutputFormat {
  if (value === 'human' || value === 'json') return value
  throw new RequestError(`Unknown output format "${value}"; expected human or json`)
}

export function writeJson(data: unknown): void {
  process.stdout.write(JSON.stringify(data, null, 2) + '\n')
}

/**
 * Print an error the way the chosen format expects and return its exit code.
 */
export function reportError(err: unknown, format: OutputFormat): number {
  const code = err instanceof LoomError ? err.code : 'INTERNAL_ERROR'
  const message = maskSecrets(err instanceof Error ? err.message : String(err))
  const exitCode = exitCodeFor(err)

  if (exitCode === EXIT_ERROR) {
    logger.error({ err }, 'Command failed')
  }
  if (format === 'json') {
    writeJson({ error: { code, message } })
  } else {
    process.stderr.write(`Error: ${message}\n`)
  }
  return exitCode
}

// ---------------------------------------------------------------------------
// Arguments
// ---------------------------------------------------------------------------

/** `kind:id`; `project:new` asks for a project that does not exist yet */
export const NEW_PROJECT_TARGET = 'project:new'

export function parseTarget(text: string): EntityRef {
  const ref = parseRef(text)
  if (ref === null) {
    throw new RequestError(`Invalid target "${text}"; expected kind:id such as scene:scene-1`)
  }
  return ref
}

export function parseInteger(text: string, label: string): number {
  const value = Number(text)
  if (text.trim() === '' || !Number.isInteger(value)) {
    throw new RequestError(`${label} must be an integer, got "${text}"`)
  }
  return value
}

// ---------------------------------------------------------------------------
// Engine access
// ---------------------------------------------------------------------------

export interface ProjectOptions {
  /** Directory holding .storyloom/ (default: cwd) */
  projectRoot?: string
  /** Global .storyloom/ directory (default: ~/.storyloom) */
  globalConfigDir?: string
}

export function projectConfigDir(options: ProjectOptions): string {
  return join(resolve(options.projectRoot ?? process.cwd()), CONFIG_DIR_NAME)
}

export function databasePath(options: ProjectOptions): string {
  return join(projectConfigDir(options), 'state.db')
}

/**
 * Load the project configuration and start the engine on its database.
 * @throws {ConfigError} when the directory was never initialized
 */
export async function openEngine(options: ProjectOptions): Promise<Orchestrator> {
  const dbPath = databasePath(options)
  if (!existsSync(dbPath)) {
    throw new ConfigError(`No StoryLoom database found at ${dbPath}. Run 'loom init' first.`, { dbPath })
  }

  const system = createConfigSystem({
    projectConfigDir: projectConfigDir(options),
    ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
  })
  await system.load()
  const config = system.getConfig()
  setLogLevel(config.global.log_level)

  return createOrchestrator({ databasePath: dbPath, config })
}

/**
 * Run `action` against an open engine, always shutting it down afterwards.
 * Errors become an exit code and a message in the chosen format.
 */
export async function withEngine(
  options: ProjectOptions & { outputFormat: OutputFormat },
  action: (engine: Orchestrator) => Promise<number>,
): Promise<number> {
  let engine: Orchestrator | null = null
  try {
    engine = await openEngine(options)
    return await action(engine)
  } catch (err) {
    return reportError(err, options.outputFormat)
  } finally {
    if (engine !== null) await engine.shutdown()
  }
}

/**
 * Parse a raw --output-format value and run `action` with it; a bad value
 * is a usage error reported in human form.
 */
export async function runWithFormat(
  raw: string,
  action: (format: OutputFormat) => Promise<number>,
): Promise<number> {
  let format: OutputFormat
  try {
    format = parseOutputFormat(raw)
  } catch (err) {
    return reportError(err, 'human')
  }
  return action(format)
}
