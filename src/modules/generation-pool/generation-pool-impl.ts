/**
 * GenerationPoolImpl
 *
 * - Concurrency limited with a FIFO queue
 * - A freed slot is handed to the oldest queued job
 * - Queued jobs can be cancelled; running jobs are cancelled through the executor
 */

import { CancelledError, PoolShutdownError, RequestError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { GenerationPool, PoolJob } from './generation-pool.js'

const logger = createLogger('generation-pool')

// ---------------------------------------------------------------------------
// Internal queue entry
// ---------------------------------------------------------------------------

interface QueuedJob {
  id: string
  start: () => void
  reject: (err: Error) => void
}

// ---------------------------------------------------------------------------
// GenerationPoolImpl
// ---------------------------------------------------------------------------

export class GenerationPoolImpl implements GenerationPool {
  private readonly _maxConcurrency: number
  private readonly _running: Map<string, Promise<void>> = new Map()
  private readonly _queue: QueuedJob[] = []
  private _shuttingDown = false

  constructor(maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new RequestError(`maxConcurrency must be a positive integer, got ${String(maxConcurrency)}`)
    }
    this._maxConcurrency = maxConcurrency
  }

  async initialize(): Promise<void> {
    logger.debug({ maxConcurrency: this._maxConcurrency }, 'Generation pool ready')
  }

  submit<T>(job: PoolJob<T>): Promise<T> {
    if (this._shuttingDown) {
      return Promise.reject(new PoolShutdownError(job.id))
    }
    if (this._running.has(job.id) || this.isQueued(job.id)) {
      return Promise.reject(new RequestError(`Job ${job.id} is already submitted`, { jobId: job.id }))
    }

    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        const settled = new Promise<T>((run) => run(job.run())).then(resolve, reject)
        this._running.set(
          job.id,
          settled.finally(() => {
            this._running.delete(job.id)
            this._drainQueue()
          }),
        )
      }

      if (this._running.size < this._maxConcurrency) {
        start()
      } else {
        this._queue.push({ id: job.id, start, reject })
        logger.debug({ id: job.id, queueLength: this._queue.length }, 'Generation queued')
      }
    })
  }

  cancelQueued(jobId: string): boolean {
    const idx = this._queue.findIndex((q) => q.id === jobId)
    if (idx === -1) return false
    const [queued] = this._queue.splice(idx, 1)
    queued?.reject(new CancelledError(jobId))
    logger.debug({ id: jobId }, 'Queued generation cancelled')
    return true
  }

  isQueued(jobId: string): boolean {
    return this._queue.some((q) => q.id === jobId)
  }

  getPending(): number {
    return this._queue.length
  }

  getRunning(): number {
    return this._running.size
  }

  async shutdown(): Promise<void> {
    this._shuttingDown = true
    logger.info({ running: this._running.size, queued: this._queue.length }, 'Generation pool shutting down')

    for (const entry of this._queue.splice(0, this._queue.length)) {
      entry.reject(new PoolShutdownError(entry.id))
    }
    await Promise.all(this._running.values())
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private _drainQueue(): void {
    if (this._shuttingDown) return
    while (this._running.size < this._maxConcurrency) {
      const next = this._queue.shift()
      if (next === undefined) return
      logger.debug({ id: next.id, queueLength: this._queue.length }, 'Dequeued generation')
      next.start()
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createGenerationPool(maxConcurrency: number): GenerationPool {
  return new GenerationPoolImpl(maxConcurrency)
}
