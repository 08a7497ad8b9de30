/**
 * `loom init` command
 *
 * Creates a `.storyloom/` directory in the current project with:
 *   - config.yaml  (built-in defaults, ready to edit)
 *   - state.db     (SQLite database with all migrations applied)
 */

import type { Command } from 'commander'
import { access, mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import yaml from 'js-yaml'
import { createDatabaseService } from '../../modules/database/database-service.js'
import { DEFAULT_CONFIG } from '../../modules/config/defaults.js'
import { createLogger } from '../../utils/logger.js'
import { databasePath, projectConfigDir } from '../utils/engine.js'

const logger = createLogger('init')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const INIT_EXIT_SUCCESS = 0
export const INIT_EXIT_ERROR = 1
export const INIT_EXIT_ALREADY_EXISTS = 2

// ---------------------------------------------------------------------------
// runInit
// ---------------------------------------------------------------------------

export interface InitOptions {
  /** Target directory (default: cwd) */
  directory?: string
  /** Overwrite an existing config.yaml */
  force?: boolean
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

const CONFIG_HEADER =
  '# StoryLoom configuration\n' +
  '# Values here override ~/.storyloom/config.yaml; LOOM_* environment variables override both.\n\n'

export async function runInit(options: InitOptions = {}): Promise<number> {
  const project = options.directory !== undefined ? { projectRoot: options.directory } : {}
  const configDir = projectConfigDir(project)
  const configPath = join(configDir, 'config.yaml')
  const dbPath = databasePath(project)

  if (!options.force && (await exists(configPath))) {
    process.stderr.write(`  ${configPath} already exists. Use --force to overwrite it.\n`)
    return INIT_EXIT_ALREADY_EXISTS
  }

  try {
    await mkdir(configDir, { recursive: true })
    await writeFile(configPath, CONFIG_HEADER + yaml.dump(DEFAULT_CONFIG), 'utf-8')

    // Opening the database applies every pending migration
    const database = createDatabaseService(dbPath)
    await database.initialize()
    await database.shutdown()
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to initialize project')
    process.stderr.write(`  Error: failed to initialize: ${message}\n`)
    return INIT_EXIT_ERROR
  }

  process.stdout.write(
    `\n  StoryLoom initialized.\n` +
      `\n  Created:\n` +
      `    ${configPath}\n` +
      `    ${dbPath}\n` +
      `\n  Next steps:\n` +
      `    1. Run \`loom config show\` to review provider settings\n` +
      `    2. Run \`loom generate project_summary project:new --input "<your idea>"\`\n`,
  )
  return INIT_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize StoryLoom in the current directory: creates .storyloom/config.yaml and the database')
    .option('-d, --directory <path>', 'Target directory (defaults to current working directory)')
    .option('-f, --force', 'Overwrite an existing configuration', false)
    .action(async (opts: { directory?: string; force: boolean }) => {
      const exitCode = await runInit({
        ...(opts.directory !== undefined && { directory: opts.directory }),
        force: opts.force,
      })
      process.exit(exitCode)
    })
}
