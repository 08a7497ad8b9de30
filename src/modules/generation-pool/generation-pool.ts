/**
 * GenerationPool: bounded FIFO execution of generation jobs.
 */

import type { BaseService } from '../../core/di.js'

export interface PoolJob<T> {
  /** Unique id; the generation id for generation jobs */
  id: string
  run: () => Promise<T>
}

export interface GenerationPool extends BaseService {
  /**
   * Queue `job`; it starts once fewer than `maxConcurrency` jobs run.
   * The returned promise settles with the job's own outcome.
   *
   * @throws {PoolShutdownError} (via the promise) after shutdown()
   */
  submit<T>(job: PoolJob<T>): Promise<T>

  /**
   * Remove a job that has not started yet; its promise rejects with
   * CancelledError.
   *
   * @returns false if the job is running, finished or unknown
   */
  cancelQueued(jobId: string): boolean

  isQueued(jobId: string): boolean

  /** Number of jobs waiting for a slot */
  getPending(): number

  /** Number of jobs currently running */
  getRunning(): number

  /**
   * Reject every queued job and wait for the running ones to settle.
   */
  shutdown(): Promise<void>
}
