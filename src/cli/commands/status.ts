/**
 * `loom status` command
 *
 * Shows the recorded state of one generation.
 *
 * Usage:
 *   loom status <generationId>
 *   loom status <generationId> --output-format json
 *
 * Exit codes:
 *   0 - Status displayed
 *   1 - System error (unexpected exception)
 *   2 - Usage error (generation not found, project not initialized)
 */

import type { Command } from 'commander'
import { renderStatus } from '../formatters/generation-formatter.js'
import { EXIT_SUCCESS, runWithFormat, withEngine, writeJson } from '../utils/engine.js'
import type { OutputFormat, ProjectOptions } from '../utils/engine.js'

export interface StatusActionOptions extends ProjectOptions {
  generationId: string
  outputFormat: OutputFormat
}

export async function runStatusAction(options: StatusActionOptions): Promise<number> {
  return withEngine(options, async (engine) => {
    const report = engine.getGenerationStatus(options.generationId)
    if (options.outputFormat === 'json') {
      writeJson(report)
    } else {
      process.stdout.write(renderStatus(report) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status <generationId>')
    .description('Show the status, attempt count and error of a generation')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <dir>', 'Directory containing .storyloom/')
    .action(async (generationId: string, opts: { outputFormat: string; projectRoot?: string }) => {
      const exitCode = await runWithFormat(opts.outputFormat, (outputFormat) =>
        runStatusAction({ generationId, outputFormat, ...(opts.projectRoot !== undefined && { projectRoot: opts.projectRoot }) }),
      )
      process.exit(exitCode)
    })
}
