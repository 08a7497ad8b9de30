/**
 * `loom generate` command
 *
 * Submits one generation (or one per child with --children), waits for the
 * attempt-chain and draft handling to finish, and prints the outcome.
 *
 * Usage:
 *   loom generate scene_summary scene:scene-1
 *   loom generate project_summary project:new --input "a space detective story"
 *   loom generate panel_list chapter:chapter-1 --children --variants 2
 *
 * Exit codes:
 *   0 - Every generation finished and its draft was handled
 *   1 - A generation or its apply failed, or a system error
 *   2 - Usage error (bad arguments, missing target, unknown draft)
 */

import type { Command } from 'commander'
import { RequestError } from '../../core/errors.js'
import type { Orchestrator, GenerationOutcome, SubmitGenerationOptions } from '../../core/orchestrator.js'
import { isContentKind, isGenerationMode } from '../../core/types.js'
import type { EntityRef, TaskKind } from '../../core/types.js'
import { renderOutcome } from '../formatters/generation-formatter.js'
import {
  EXIT_ERROR,
  EXIT_SUCCESS,
  NEW_PROJECT_TARGET,
  parseInteger,
  parseTarget,
  reportError,
  runWithFormat,
  withEngine,
  writeJson,
} from '../utils/engine.js'
import type { OutputFormat, ProjectOptions } from '../utils/engine.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GenerateActionOptions extends ProjectOptions {
  taskKind: string
  target: string
  input?: string
  mode?: string
  provider?: string
  variants?: string
  children: boolean
  outputFormat: OutputFormat
}

// ---------------------------------------------------------------------------
// Shared with `loom revise`
// ---------------------------------------------------------------------------

/**
 * Subscribe to attempt failures so a human watching the terminal sees
 * retries as they happen.
 */
export function reportRetries(engine: Orchestrator, format: OutputFormat): void {
  if (format !== 'human') return
  engine.eventBus.on('generation:attempt-failed', ({ generationId, attempt, error, willRetry }) => {
    const next = willRetry ? 'retrying' : 'giving up'
    process.stderr.write(`  ${generationId}: attempt ${String(attempt)} failed (${error.message}); ${next}\n`)
  })
}

/** Print outcomes and derive the exit code from them */
export function printOutcomes(outcomes: GenerationOutcome[], format: OutputFormat): number {
  if (format === 'json') {
    writeJson({ outcomes })
  } else {
    process.stdout.write(outcomes.map(renderOutcome).join('\n\n') + '\n')
  }
  return outcomes.some((outcome) => outcome.error !== null) ? EXIT_ERROR : EXIT_SUCCESS
}

/** Parse the generation options shared by generate and revise */
export function parseSubmitOptions(opts: {
  input?: string
  mode?: string
  provider?: string
  variants?: string
}): SubmitGenerationOptions {
  const options: SubmitGenerationOptions = {}
  if (opts.mode !== undefined) {
    if (!isGenerationMode(opts.mode)) {
      throw new RequestError(`Unknown mode "${opts.mode}"; expected direct or review`)
    }
    options.mode = opts.mode
  }
  if (opts.variants !== undefined) options.variants = parseInteger(opts.variants, 'variants')
  if (opts.provider !== undefined) options.provider = opts.provider
  if (opts.input !== undefined) options.userInput = opts.input
  return options
}

// ---------------------------------------------------------------------------
// runGenerateAction
// ---------------------------------------------------------------------------

export async function runGenerateAction(options: GenerateActionOptions): Promise<number> {
  let taskKind: TaskKind
  let submit: SubmitGenerationOptions
  try {
    if (!isContentKind(options.taskKind)) {
      throw new RequestError(`Unknown task kind "${options.taskKind}"`)
    }
    taskKind = options.taskKind
    submit = parseSubmitOptions(options)
  } catch (err) {
    return reportError(err, options.outputFormat)
  }

  return withEngine(options, async (engine) => {
    const target: EntityRef =
      options.target === NEW_PROJECT_TARGET ? engine.newProjectRef() : parseTarget(options.target)
    reportRetries(engine, options.outputFormat)

    const ids = options.children
      ? engine.submitForChildren(taskKind, target, submit)
      : [engine.submitGeneration(taskKind, target, submit)]
    if (ids.length === 0) {
      process.stderr.write('Nothing to generate: the target has no children of the right kind.\n')
      return EXIT_SUCCESS
    }

    const outcomes = await Promise.all(ids.map((id) => engine.waitForGeneration(id)))
    return printOutcomes(outcomes, options.outputFormat)
  })
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate <task-kind> <target>')
    .description(`Generate content for a target (kind:id; ${NEW_PROJECT_TARGET} for a fresh project)`)
    .option('-i, --input <text>', 'Free-text idea carried into the context')
    .option('-m, --mode <mode>', 'direct or review; overrides instruction directives')
    .option('-p, --provider <id>', 'Provider id; routing rules apply otherwise')
    .option('-n, --variants <count>', 'Number of variants to request (1-5)')
    .option('-c, --children', 'Run the task once for every child of the target', false)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <dir>', 'Directory containing .storyloom/')
    .action(
      async (
        taskKind: string,
        target: string,
        opts: {
          input?: string
          mode?: string
          provider?: string
          variants?: string
          children: boolean
          outputFormat: string
          projectRoot?: string
        },
      ) => {
        const exitCode = await runWithFormat(opts.outputFormat, (outputFormat) =>
          runGenerateAction({ ...opts, taskKind, target, outputFormat }),
        )
        process.exit(exitCode)
      },
    )
}
