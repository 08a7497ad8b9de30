/**
 * Shared types for generation providers
 */

import type { TaskKind } from '../core/types.js'
import type { OutputShape } from '../modules/task-registry/types.js'

export type { OutputShape }

/**
 * What a provider receives for one attempt.
 */
export interface ProviderRequest {
  /** Generation record this attempt belongs to */
  generationId: string
  /** Task kind being generated */
  taskKind: TaskKind
  /**
   * Deterministic request document (sorted-key JSON) describing the
   * context, output shape and cardinality bounds.
   */
  body: string
  /** Shape every returned variant must follow */
  shape: OutputShape
  /** Number of alternative payloads requested (1-5) */
  variants: number
}

/**
 * Per-call options handed to a provider.
 */
export interface ProviderCallOptions {
  /** Upper bound for this attempt in milliseconds */
  timeoutMs: number
  /** Aborted when the attempt times out; providers should stop work */
  signal: AbortSignal
}

/**
 * Raw provider output, not yet validated.
 */
export interface ProviderResult {
  /** Unvalidated payloads, one per requested variant */
  variants: unknown[]
  /** Provider-reported model name, if known */
  model?: string
  /** Token usage, if the provider reports it */
  tokensUsed?: { input: number; output: number }
}

/**
 * Result of a provider health check.
 */
export interface ProviderHealthResult {
  healthy: boolean
  /** Version string reported by the backing tool */
  version?: string
  /** Error message when unhealthy */
  error?: string
}
