/**
 * GenerationExecutor: public interface for the generation-executor module.
 */

import type { ExecuteRequest, ExecutorResult } from './types.js'

export interface GenerationExecutor {
  /**
   * Run one attempt-chain: call the provider, validate the variants, and
   * retry transient failures with exponential backoff up to MAX_ATTEMPTS.
   *
   * Updates only the generation record named by the request. Never writes
   * content entities or drafts.
   *
   * @throws {ValidationError} when every attempt returned invalid output
   * @throws {CapabilityError} on a permanent provider failure or after the last transient one
   * @throws {CancelledError} when the generation was cancelled at a retry boundary
   */
  execute(request: ExecuteRequest): Promise<ExecutorResult>

  /**
   * Ask a running chain to stop. Observed at the next retry boundary; a
   * provider call already in flight finishes and its result is discarded.
   *
   * @returns true if the generation was running under this executor
   */
  cancel(generationId: string): boolean
}
