/**
 * Draft review commands
 *
 *   - `loom drafts <target>`                      list drafts for a target, newest first
 *   - `loom select <draftId> <variant>`           apply one variant to the hierarchy
 *   - `loom reject <draftId>`                     discard a pending draft
 *   - `loom revise <draftId> --feedback <text>`   regenerate with feedback and wait
 */

import type { Command } from 'commander'
import { RequestError } from '../../core/errors.js'
import { isContentKind, isDraftStatus } from '../../core/types.js'
import type { DraftFilter } from '../../modules/draft-lifecycle/types.js'
import { renderApplied, renderDraft, renderDrafts } from '../formatters/generation-formatter.js'
import {
  EXIT_SUCCESS,
  parseInteger,
  parseTarget,
  reportError,
  runWithFormat,
  withEngine,
  writeJson,
} from '../utils/engine.js'
import type { OutputFormat, ProjectOptions } from '../utils/engine.js'
import { parseSubmitOptions, printOutcomes, reportRetries } from './generate.js'

interface FormatOptions extends ProjectOptions {
  outputFormat: OutputFormat
}

// ---------------------------------------------------------------------------
// drafts
// ---------------------------------------------------------------------------

export interface DraftsActionOptions extends FormatOptions {
  target: string
  status?: string
  kind?: string
}

function parseFilter(options: DraftsActionOptions): DraftFilter {
  const filter: DraftFilter = {}
  if (options.status !== undefined) {
    if (!isDraftStatus(options.status)) throw new RequestError(`Unknown draft status "${options.status}"`)
    filter.status = options.status
  }
  if (options.kind !== undefined) {
    if (!isContentKind(options.kind)) throw new RequestError(`Unknown content kind "${options.kind}"`)
    filter.contentKind = options.kind
  }
  return filter
}

export async function runDraftsAction(options: DraftsActionOptions): Promise<number> {
  return withEngine(options, async (engine) => {
    const target = parseTarget(options.target)
    const drafts = engine.listDrafts(target, parseFilter(options))

    if (options.outputFormat === 'json') {
      writeJson({ drafts })
    } else if (drafts.length === 0) {
      process.stdout.write(`No drafts for ${options.target}.\n`)
    } else {
      process.stdout.write(renderDrafts(drafts) + '\n')
    }
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// select / reject
// ---------------------------------------------------------------------------

export async function runSelectAction(
  options: FormatOptions & { draftId: string; variant: string },
): Promise<number> {
  let variant: number
  try {
    variant = parseInteger(options.variant, 'variant')
  } catch (err) {
    return reportError(err, options.outputFormat)
  }

  return withEngine(options, async (engine) => {
    const applied = await engine.selectDraft(options.draftId, variant)
    if (options.outputFormat === 'json') {
      writeJson({ draft: engine.getDraft(options.draftId), applied })
    } else {
      process.stdout.write(renderApplied(applied) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export async function runRejectAction(options: FormatOptions & { draftId: string }): Promise<number> {
  return withEngine(options, async (engine) => {
    const draft = await engine.rejectDraft(options.draftId)
    if (options.outputFormat === 'json') {
      writeJson({ draft })
    } else {
      process.stdout.write(renderDraft(draft) + '\n')
    }
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// revise
// ---------------------------------------------------------------------------

export interface ReviseActionOptions extends FormatOptions {
  draftId: string
  feedback: string
  provider?: string
  variants?: string
}

export async function runReviseAction(options: ReviseActionOptions): Promise<number> {
  return withEngine(options, async (engine) => {
    reportRetries(engine, options.outputFormat)
    const generationId = await engine.reviseDraft(options.draftId, options.feedback, parseSubmitOptions(options))
    const outcome = await engine.waitForGeneration(generationId)
    return printOutcomes([outcome], options.outputFormat)
  })
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

function projectRootOf(opts: { projectRoot?: string }): ProjectOptions {
  return opts.projectRoot !== undefined ? { projectRoot: opts.projectRoot } : {}
}

export function registerDraftCommands(program: Command): void {
  program
    .command('drafts <target>')
    .description('List the drafts generated for a target (kind:id)')
    .option('-s, --status <status>', 'Only drafts in this status')
    .option('-k, --kind <contentKind>', 'Only drafts of this content kind')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <dir>', 'Directory containing .storyloom/')
    .action(
      async (target: string, opts: { status?: string; kind?: string; outputFormat: string; projectRoot?: string }) => {
        const exitCode = await runWithFormat(opts.outputFormat, (outputFormat) =>
          runDraftsAction({ ...opts, target, outputFormat }),
        )
        process.exit(exitCode)
      },
    )

  program
    .command('select <draftId> <variant>')
    .description('Select a variant of a pending draft and apply it')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <dir>', 'Directory containing .storyloom/')
    .action(async (draftId: string, variant: string, opts: { outputFormat: string; projectRoot?: string }) => {
      const exitCode = await runWithFormat(opts.outputFormat, (outputFormat) =>
        runSelectAction({ ...projectRootOf(opts), draftId, variant, outputFormat }),
      )
      process.exit(exitCode)
    })

  program
    .command('reject <draftId>')
    .description('Reject a pending draft')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <dir>', 'Directory containing .storyloom/')
    .action(async (draftId: string, opts: { outputFormat: string; projectRoot?: string }) => {
      const exitCode = await runWithFormat(opts.outputFormat, (outputFormat) =>
        runRejectAction({ ...projectRootOf(opts), draftId, outputFormat }),
      )
      process.exit(exitCode)
    })

  program
    .command('revise <draftId>')
    .description('Send feedback on a draft and generate a revised one')
    .requiredOption('-f, --feedback <text>', 'What to change')
    .option('-p, --provider <id>', 'Provider id; routing rules apply otherwise')
    .option('-n, --variants <count>', 'Number of variants to request (1-5)')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <dir>', 'Directory containing .storyloom/')
    .action(
      async (
        draftId: string,
        opts: { feedback: string; provider?: string; variants?: string; outputFormat: string; projectRoot?: string },
      ) => {
        const exitCode = await runWithFormat(opts.outputFormat, (outputFormat) =>
          runReviseAction({ ...opts, draftId, outputFormat }),
        )
        process.exit(exitCode)
      },
    )
}
