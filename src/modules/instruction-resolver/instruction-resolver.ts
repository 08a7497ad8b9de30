/**
 * InstructionResolver: public interface for the instruction-resolver module.
 */

import type { ContentKind, EntityRef, ScopeKind } from '../../core/types.js'
import type { Instruction } from '../../persistence/queries/instructions.js'
import type { AddInstructionInput, ResolvedInstruction } from './types.js'

// ---------------------------------------------------------------------------
// InstructionResolver interface
// ---------------------------------------------------------------------------

export interface InstructionResolver {
  /**
   * Effective instructions for `target` and `contentKind`, strongest first:
   * scope specificity (panel, scene, chapter, project), then priority
   * descending, then newest first. Inactive instructions are excluded.
   *
   * @throws {ScopeError} if the target's ancestor chain is broken
   */
  resolve(target: EntityRef, contentKind: ContentKind): ResolvedInstruction[]

  /**
   * Store a new active instruction on a scope entity. The directive is
   * parsed from the text unless given explicitly.
   *
   * @throws {RequestError} on invalid input
   * @throws {ScopeError} if the scope entity does not exist
   */
  add(input: AddInstructionInput): Instruction

  /**
   * @throws {NotFoundError} if no instruction has this id
   */
  deactivate(id: string): void

  /** All instructions attached to one scope entity, newest first */
  list(scope: { kind: ScopeKind; id: string }): Instruction[]
}
