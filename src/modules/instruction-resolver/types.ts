/**
 * Types and Zod schemas for the instruction-resolver module.
 */

import { z } from 'zod'
import { INSTRUCTION_CONTENT_KINDS, SCOPE_KINDS } from '../../core/types.js'
import type { Directive, ScopeKind } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_INSTRUCTION_PRIORITY = 500
export const MIN_INSTRUCTION_PRIORITY = 0
export const MAX_INSTRUCTION_PRIORITY = 1000

/** Specificity rank of each scope kind; lower sorts first */
export const SCOPE_RANK: Readonly<Record<ScopeKind, number>> = {
  panel: 0,
  scene: 1,
  chapter: 2,
  project: 3,
}

// ---------------------------------------------------------------------------
// AddInstructionInput
// ---------------------------------------------------------------------------

export const AddInstructionInputSchema = z.object({
  scope: z.object({
    kind: z.enum(SCOPE_KINDS),
    id: z.string().min(1),
  }),
  contentKind: z.enum(INSTRUCTION_CONTENT_KINDS),
  text: z.string().trim().min(1),
  priority: z
    .number()
    .int()
    .min(MIN_INSTRUCTION_PRIORITY)
    .max(MAX_INSTRUCTION_PRIORITY)
    .default(DEFAULT_INSTRUCTION_PRIORITY),
  /** Explicit directive; when omitted it is parsed from the text */
  directive: z.enum(['direct', 'review']).nullable().optional(),
})
export type AddInstructionInput = z.input<typeof AddInstructionInputSchema>

// ---------------------------------------------------------------------------
// ResolvedInstruction
// ---------------------------------------------------------------------------

/** One effective instruction, as handed to context assembly and the mode controller */
export interface ResolvedInstruction {
  id: string
  text: string
  scopeKind: ScopeKind
  scopeId: string
  priority: number
  directive: Directive | null
}
