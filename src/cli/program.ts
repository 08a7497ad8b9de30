/**
 * Commander program for the `loom` CLI, kept apart from the entry point so
 * tests can build it without running it.
 */

import { Command } from 'commander'
import { registerConfigCommand } from './commands/config.js'
import { registerDraftCommands } from './commands/drafts.js'
import { registerGenerateCommand } from './commands/generate.js'
import { registerInitCommand } from './commands/init.js'
import { registerInstructionCommand } from './commands/instruction.js'
import { registerProvidersCommand } from './commands/providers.js'
import { registerStatusCommand } from './commands/status.js'

/**
 * Create and configure the CLI program.
 *
 * Usage errors raised by commander (unknown command, missing argument)
 * surface as CommanderError through `exitOverride`.
 */
export function createProgram(version: string): Command {
  const program = new Command()

  program
    .name('loom')
    .description('StoryLoom - generate and review hierarchical story content')
    .version(version, '-v, --version', 'Output the current version')
    .exitOverride()

  registerInitCommand(program)
  registerConfigCommand(program)
  registerGenerateCommand(program)
  registerStatusCommand(program)
  registerDraftCommands(program)
  registerInstructionCommand(program)
  registerProvidersCommand(program)

  return program
}
