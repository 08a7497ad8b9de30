/**
 * `loom instruction` command group
 *
 * Subcommands:
 *   - `loom instruction add <scope> <text>`     attach an instruction to a project, chapter, scene or panel
 *   - `loom instruction list <scope>`           show instructions stored on a scope
 *   - `loom instruction deactivate <id>`        stop an instruction from applying
 */

import type { Command } from 'commander'
import { RequestError } from '../../core/errors.js'
import { isContentKind, isScopeKind } from '../../core/types.js'
import type { ScopeKind } from '../../core/types.js'
import type { AddInstructionInput } from '../../modules/instruction-resolver/types.js'
import { renderInstructionTable } from '../formatters/generation-formatter.js'
import { EXIT_SUCCESS, parseInteger, parseTarget, runWithFormat, withEngine, writeJson } from '../utils/engine.js'
import type { OutputFormat, ProjectOptions } from '../utils/engine.js'

interface FormatOptions extends ProjectOptions {
  outputFormat: OutputFormat
}

function parseScope(text: string): { kind: ScopeKind; id: string } {
  const ref = parseTarget(text)
  if (!isScopeKind(ref.kind)) {
    throw new RequestError(`Instructions attach to a project, chapter, scene or panel, not a ${ref.kind}`)
  }
  return { kind: ref.kind, id: ref.id }
}

// ---------------------------------------------------------------------------
// add
// ---------------------------------------------------------------------------

export interface InstructionAddOptions extends FormatOptions {
  scope: string
  text: string
  /** Content kind the instruction applies to, or "all" */
  kind: string
  priority?: string
  directive?: string
}

export async function runInstructionAdd(options: InstructionAddOptions): Promise<number> {
  return withEngine(options, async (engine) => {
    const contentKind = options.kind
    if (contentKind !== 'all' && !isContentKind(contentKind)) {
      throw new RequestError(`Unknown content kind "${contentKind}"`)
    }
    const input: AddInstructionInput = { scope: parseScope(options.scope), contentKind, text: options.text }
    if (options.priority !== undefined) input.priority = parseInteger(options.priority, 'priority')
    if (options.directive !== undefined) {
      if (options.directive !== 'direct' && options.directive !== 'review') {
        throw new RequestError(`Unknown directive "${options.directive}"; expected direct or review`)
      }
      input.directive = options.directive
    }

    const instruction = engine.addInstruction(input)
    if (options.outputFormat === 'json') {
      writeJson({ instruction })
    } else {
      const directive = instruction.directive === null ? '' : ` (directive: ${instruction.directive})`
      process.stdout.write(`Added instruction ${instruction.id}${directive}\n`)
    }
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

export async function runInstructionList(options: FormatOptions & { scope: string }): Promise<number> {
  return withEngine(options, async (engine) => {
    const instructions = engine.listInstructions(parseScope(options.scope))
    if (options.outputFormat === 'json') {
      writeJson({ instructions })
    } else if (instructions.length === 0) {
      process.stdout.write(`No instructions on ${options.scope}.\n`)
    } else {
      process.stdout.write(renderInstructionTable(instructions) + '\n')
    }
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// deactivate
// ---------------------------------------------------------------------------

export async function runInstructionDeactivate(options: FormatOptions & { id: string }): Promise<number> {
  return withEngine(options, async (engine) => {
    engine.deactivateInstruction(options.id)
    if (options.outputFormat === 'json') {
      writeJson({ id: options.id, active: false })
    } else {
      process.stdout.write(`Deactivated instruction ${options.id}\n`)
    }
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

export function registerInstructionCommand(program: Command): void {
  const instructionCmd = program.command('instruction').description('Manage generation instructions')

  instructionCmd
    .command('add <scope> <text>')
    .description('Attach an instruction to a scope (kind:id)')
    .option('-k, --kind <contentKind>', 'Content kind it applies to, or "all"', 'all')
    .option('--priority <n>', 'Priority 0-1000; higher wins within a scope')
    .option('--directive <directive>', 'direct or review; parsed from the text otherwise')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <dir>', 'Directory containing .storyloom/')
    .action(
      async (
        scope: string,
        text: string,
        opts: { kind: string; priority?: string; directive?: string; outputFormat: string; projectRoot?: string },
      ) => {
        const exitCode = await runWithFormat(opts.outputFormat, (outputFormat) =>
          runInstructionAdd({ ...opts, scope, text, outputFormat }),
        )
        process.exit(exitCode)
      },
    )

  instructionCmd
    .command('list <scope>')
    .description('List the instructions stored on a scope')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <dir>', 'Directory containing .storyloom/')
    .action(async (scope: string, opts: { outputFormat: string; projectRoot?: string }) => {
      const exitCode = await runWithFormat(opts.outputFormat, (outputFormat) =>
        runInstructionList({ ...opts, scope, outputFormat }),
      )
      process.exit(exitCode)
    })

  instructionCmd
    .command('deactivate <id>')
    .description('Stop an instruction from applying')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <dir>', 'Directory containing .storyloom/')
    .action(async (id: string, opts: { outputFormat: string; projectRoot?: string }) => {
      const exitCode = await runWithFormat(opts.outputFormat, (outputFormat) =>
        runInstructionDeactivate({ ...opts, id, outputFormat }),
      )
      process.exit(exitCode)
    })
}
