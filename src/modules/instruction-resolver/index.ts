/**
 * instruction-resolver module: public API re-exports
 */

export type { InstructionResolver } from './instruction-resolver.js'

export {
  InstructionResolverImpl,
  createInstructionResolver,
  compareInstructions,
} from './instruction-resolver-impl.js'

export { parseDirective } from './directive-parser.js'

export {
  AddInstructionInputSchema,
  DEFAULT_INSTRUCTION_PRIORITY,
  MIN_INSTRUCTION_PRIORITY,
  MAX_INSTRUCTION_PRIORITY,
  SCOPE_RANK,
} from './types.js'

export type { AddInstructionInput, ResolvedInstruction } from './types.js'
