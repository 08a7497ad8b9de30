/**
 * `loom providers` command
 *
 * Runs the health check of every enabled provider.
 *
 * Usage:
 *   loom providers
 *   loom providers --output-format json
 *
 * Exit codes:
 *   0 - Every enabled provider is healthy
 *   1 - At least one provider is unhealthy, or a system error
 *   2 - Usage error (project not initialized)
 */

import type { Command } from 'commander'
import { renderProviderTable } from '../formatters/generation-formatter.js'
import { EXIT_ERROR, EXIT_SUCCESS, runWithFormat, withEngine, writeJson } from '../utils/engine.js'
import type { OutputFormat, ProjectOptions } from '../utils/engine.js'

export interface ProvidersActionOptions extends ProjectOptions {
  outputFormat: OutputFormat
}

export async function runProvidersAction(options: ProvidersActionOptions): Promise<number> {
  return withEngine(options, async (engine) => {
    const reports = await engine.checkProviders()
    if (options.outputFormat === 'json') {
      writeJson({ providers: reports })
    } else {
      process.stdout.write(renderProviderTable(reports) + '\n')
    }
    return reports.every((report) => report.health.healthy) ? EXIT_SUCCESS : EXIT_ERROR
  })
}

export function registerProvidersCommand(program: Command): void {
  program
    .command('providers')
    .description('Check that every enabled generation provider is available')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <dir>', 'Directory containing .storyloom/')
    .action(async (opts: { outputFormat: string; projectRoot?: string }) => {
      const exitCode = await runWithFormat(opts.outputFormat, (outputFormat) =>
        runProvidersAction({ outputFormat, ...(opts.projectRoot !== undefined && { projectRoot: opts.projectRoot }) }),
      )
      process.exit(exitCode)
    })
}
