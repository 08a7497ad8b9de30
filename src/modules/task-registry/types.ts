/**
 * Types for the task-registry module.
 *
 * A task definition describes one generation task kind: which entities it
 * may target, the structure of one output variant, how that structure is
 * validated, and (for list tasks) which child entities it materializes.
 */

import type { ContentKind, EntityKind } from '../../core/types.js'
import type { CardinalityBounds, ListTaskKind } from '../config/config-schema.js'

// ---------------------------------------------------------------------------
// Output shape
// ---------------------------------------------------------------------------

/**
 * Structural description of one output variant sent to the capability.
 * Leaf strings name the field type; a trailing `?` marks an optional field.
 */
export type OutputShape = { [field: string]: string | OutputShape | [OutputShape] }

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Caller-supplied limits a variant must satisfy */
export interface ValidationRules {
  /** Item count bounds for list tasks; null for single-payload tasks */
  cardinality: CardinalityBounds | null
  /** Names of characters that cross-references may point at */
  rosterNames: readonly string[]
}

export type ValidationOutcome =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; issues: string[] }

// ---------------------------------------------------------------------------
// TaskDefinition
// ---------------------------------------------------------------------------

export interface ListSpec {
  kind: ListTaskKind
  /** Key of the item array inside the variant payload */
  itemsKey: string
  /** Entity kind created for each item on apply */
  childKind: EntityKind
}

export interface TaskDefinition {
  kind: ContentKind
  label: string
  /** Entity kinds this task may target */
  targetKinds: readonly EntityKind[]
  /** Set for tasks whose output is a list of child entities */
  list: ListSpec | null
  /** Child entity kind whose existing members are shown in the context */
  contextChildKind: EntityKind | null
  /** Include the project's characters in the context */
  includeRoster: boolean
  /** Fail context assembly when the project has no characters */
  rosterRequired: boolean
  shape: OutputShape
  validate(raw: unknown, rules: ValidationRules): ValidationOutcome
}
