/**
 * context-assembler module: public API re-exports
 */

export type { ContextAssembler } from './context-assembler.js'

export {
  ContextAssemblerImpl,
  createContextAssembler,
  retainMostRecent,
} from './context-assembler-impl.js'

export type { ContextAssemblerOptions } from './context-assembler-impl.js'

export { countTokens, countValueTokens } from './token-counter.js'

export type {
  AssembleRequest,
  ContextEntity,
  GenerationContext,
  OmittedCounts,
  RevisionFeedback,
} from './types.js'
