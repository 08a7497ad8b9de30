/**
 * Types for the context-assembler module.
 */

import type { EntityKind, EntityRef, TaskKind } from '../../core/types.js'
import type { CardinalityBounds } from '../config/config-schema.js'
import type { ResolvedInstruction } from '../instruction-resolver/types.js'

// ---------------------------------------------------------------------------
// ContextEntity
// ---------------------------------------------------------------------------

/** Snapshot of one content entity as it appears in a context */
export interface ContextEntity {
  kind: EntityKind
  id: string
  position: number
  version: number
  fields: Record<string, unknown>
}

// ---------------------------------------------------------------------------
// Feedback
// ---------------------------------------------------------------------------

/** Revision feedback carried into a follow-up generation */
export interface RevisionFeedback {
  text: string
  /** The variant being revised, for contrast; null when the draft had no selection */
  previousVariant: unknown
}

// ---------------------------------------------------------------------------
// AssembleRequest
// ---------------------------------------------------------------------------

export interface AssembleRequest {
  taskKind: TaskKind
  target: EntityRef
  /** Free-text idea from the user */
  userInput?: string | null
  feedback?: RevisionFeedback | null
}

// ---------------------------------------------------------------------------
// GenerationContext
// ---------------------------------------------------------------------------

/** How many trimmable items the size policy left out, per section */
export interface OmittedCounts {
  roster: number
  existingChildren: number
  siblings: number
}

/**
 * Everything one generation needs, frozen once assembled.
 *
 * Protected sections (target, parent, ancestors, style guide, instructions,
 * user input, feedback, roster names) are never trimmed; roster, existing
 * children and siblings are trimmed to the token budget.
 */
export interface GenerationContext {
  taskKind: TaskKind
  targetRef: EntityRef
  /** Null when the task creates its target (a new project) */
  target: ContextEntity | null
  parent: ContextEntity | null
  /** Parent first, up to the project root */
  ancestors: ContextEntity[]
  /** Same-kind entities under the same parent, by position */
  siblings: ContextEntity[]
  /** Live children the task's list would extend, by position */
  existingChildren: ContextEntity[]
  /** Project characters, by position */
  roster: ContextEntity[]
  /** Every roster name, kept even when roster entries are trimmed */
  rosterNames: string[]
  styleGuide: string | null
  instructions: ResolvedInstruction[]
  userInput: string | null
  feedback: RevisionFeedback | null
  cardinality: CardinalityBounds | null
  truncated: boolean
  omitted: OmittedCounts
}
