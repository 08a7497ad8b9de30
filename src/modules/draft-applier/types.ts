/**
 * Types for the draft-applier module.
 */

import type { EntityRef } from '../../core/types.js'
import type { ContentEntity } from '../../persistence/queries/entities.js'

export interface ApplyResult {
  /** The target after the write; created when the task creates its own target */
  target: ContentEntity
  /** Child entities materialized by a list task, in position order */
  created: ContentEntity[]
}

export interface ApplyRequest {
  target: EntityRef
  /** The selected variant as stored on the draft */
  payload: unknown
}
