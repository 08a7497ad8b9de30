/**
 * Types and the transition table for the draft-lifecycle module.
 */

import type { ContentKind, DraftStatus, EntityRef } from '../../core/types.js'
import type { Draft } from '../../persistence/queries/drafts.js'

// ---------------------------------------------------------------------------
// Events and transitions
// ---------------------------------------------------------------------------

export const DRAFT_EVENTS = ['select', 'reject', 'revise', 'supersede', 'apply', 'apply_failed'] as const
export type DraftEvent = (typeof DRAFT_EVENTS)[number]

/**
 * Every legal (status, event) pair and the status it leads to.
 *
 * applied and superseded are terminal. A revised draft is superseded by the
 * pending draft its revision produces; revising it again is allowed when
 * that revision failed.
 */
export const DRAFT_TRANSITIONS: Readonly<Record<DraftStatus, Readonly<Partial<Record<DraftEvent, DraftStatus>>>>> = {
  pending: { select: 'selected', reject: 'rejected', revise: 'revised', supersede: 'superseded' },
  selected: { apply: 'applied', apply_failed: 'rejected', revise: 'revised' },
  rejected: { revise: 'revised' },
  revised: { revise: 'revised', supersede: 'superseded' },
  applied: {},
  superseded: {},
}

/**
 * @returns the status `event` leads to from `from`, or null if illegal
 */
export function nextStatus(from: DraftStatus, event: DraftEvent): DraftStatus | null {
  return DRAFT_TRANSITIONS[from][event] ?? null
}

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface CreateDraftInput {
  target: EntityRef
  contentKind: ContentKind
  /** Validated payloads, 1-5 */
  variants: Record<string, unknown>[]
  generationId: string | null
  /** The revised draft this one answers */
  createdFromDraftId?: string | null
  feedback?: string | null
}

export interface CreateDraftResult {
  draft: Draft
  /** Drafts moved to superseded by this creation, oldest first */
  supersededDraftIds: string[]
}

export interface DraftFilter {
  contentKind?: ContentKind
  status?: DraftStatus
}
