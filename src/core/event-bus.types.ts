/**
 * EngineEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {subject}:{action} (e.g. "generation:completed").
 */

import type { ContentKind, DraftStatus, EntityRef, TaskKind } from './types.js'

/** Error payload carried by failure events */
export interface EventError {
  message: string
  code?: string
}

/**
 * Complete typed map of all events emitted on the engine event bus.
 */
export interface EngineEvents {
  // -------------------------------------------------------------------------
  // Generation attempt-chain events
  // -------------------------------------------------------------------------

  /** A generation request was accepted and waits for a worker slot */
  'generation:queued': { generationId: string; taskKind: TaskKind; target: EntityRef; provider: string }

  /** A worker picked up the generation; `attempt` is 1-based */
  'generation:started': { generationId: string; attempt: number }

  /** One attempt failed; `willRetry` tells whether another attempt follows */
  'generation:attempt-failed': {
    generationId: string
    attempt: number
    error: EventError
    willRetry: boolean
  }

  /** Output validated; `variantCount` payloads were returned to the caller */
  'generation:completed': { generationId: string; attemptCount: number; variantCount: number }

  /** The attempt-chain ended in failure */
  'generation:failed': { generationId: string; attemptCount: number; error: EventError }

  /** The generation was cancelled before producing a result */
  'generation:cancelled': { generationId: string; attemptCount: number }

  // -------------------------------------------------------------------------
  // Draft lifecycle events
  // -------------------------------------------------------------------------

  /** A new pending draft was stored; `supersededDraftId` names the draft it replaced */
  'draft:created': {
    draftId: string
    target: EntityRef
    contentKind: ContentKind
    variantCount: number
    supersededDraftId: string | null
  }

  /** A draft moved between lifecycle states */
  'draft:transitioned': { draftId: string; from: DraftStatus; to: DraftStatus; event: string }

  /** A selected variant was committed to its target entity */
  'draft:applied': { draftId: string; target: EntityRef; createdEntityIds: string[] }
}
