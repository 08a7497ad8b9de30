/**
 * DraftLifecycleManager: public interface for the draft-lifecycle module.
 */

import type { ContentKind, EntityRef } from '../../core/types.js'
import type { Draft } from '../../persistence/queries/drafts.js'
import type { CreateDraftInput, CreateDraftResult, DraftFilter } from './types.js'

export interface DraftLifecycleManager {
  /**
   * Store a new pending draft, superseding the current pending draft for
   * the same target and content kind (and the revised draft it answers).
   *
   * Runs under the advisory lock for (target, content kind).
   *
   * @throws {ConflictError} if another pending draft appeared despite the lock
   * @throws {RequestError} for a variant count outside 1-5
   */
  create(input: CreateDraftInput): Promise<CreateDraftResult>

  /** @throws {NotFoundError} */
  get(draftId: string): Draft

  /** Drafts for one target, oldest first */
  list(target: EntityRef, filter?: DraftFilter): Draft[]

  /**
   * pending → selected, recording the chosen variant.
   * @throws {IllegalTransitionError} | {RequestError} for an out-of-range index
   */
  select(draftId: string, variantIndex: number): Draft

  /** pending → rejected */
  reject(draftId: string): Draft

  /** pending | selected | rejected | revised → revised, attaching feedback */
  revise(draftId: string, feedback: string): Draft

  /** selected → applied */
  markApplied(draftId: string): Draft

  /** selected → rejected, attaching a system error */
  markApplyFailed(draftId: string, systemError: string): Draft

  /**
   * Run `fn` while holding the single-writer lock for (target, content kind).
   */
  runExclusive<T>(target: EntityRef, contentKind: ContentKind, fn: () => Promise<T> | T): Promise<T>
}
