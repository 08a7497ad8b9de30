/**
 * ContextAssembler: public interface for the context-assembler module.
 */

import type { AssembleRequest, GenerationContext } from './types.js'

export interface ContextAssembler {
  /**
   * Gather everything one generation needs into a frozen snapshot.
   *
   * Read-only and idempotent: against unchanged store state two calls
   * return structurally equal contexts.
   *
   * @throws {ContextError} if the target or a required ancestor is missing,
   *   the hierarchy is broken, or a required cross-reference cannot be resolved
   */
  assemble(request: AssembleRequest): GenerationContext
}
