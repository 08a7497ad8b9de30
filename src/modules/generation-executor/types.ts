/**
 * Types for the generation-executor module.
 */

import type { GenerationMode } from '../../core/types.js'
import type { GenerationProvider } from '../../adapters/generation-provider.js'
import type { GenerationContext } from '../context-assembler/types.js'
import type { TaskDefinition } from '../task-registry/types.js'

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Attempts per attempt-chain, the first one included */
export const MAX_ATTEMPTS = 3

export const MIN_VARIANTS = 1
export const MAX_VARIANTS = 5

// ---------------------------------------------------------------------------
// ExecuteRequest
// ---------------------------------------------------------------------------

/**
 * Input to one attempt-chain. The context is frozen and reused unchanged
 * for every attempt.
 */
export interface ExecuteRequest {
  /** Generation record created by the caller; the executor only updates it */
  generationId: string
  context: GenerationContext
  definition: TaskDefinition
  provider: GenerationProvider
  mode: GenerationMode
  /** Number of variants to request (1-5) */
  variants: number
}

// ---------------------------------------------------------------------------
// ExecutorResult
// ---------------------------------------------------------------------------

export interface ExecutorResult {
  generationId: string
  /** Validated payloads, one per requested variant */
  variants: Record<string, unknown>[]
  /** Attempts made, 1-based */
  attemptCount: number
  mode: GenerationMode
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  /** Delay before the second attempt; doubles for each later one */
  backoffBaseMs: number
  /** Bounded wait for a single provider call */
  attemptTimeoutMs: number
}
