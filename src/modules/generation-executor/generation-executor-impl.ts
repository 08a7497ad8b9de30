/**
 * GenerationExecutorImpl: runs one attempt-chain per generation record.
 *
 * Per attempt:
 *  1. Stop if cancellation was requested (retry boundary)
 *  2. Record the attempt on the generation row
 *  3. Call the provider under a bounded wait
 *  4. Discard the result if cancellation arrived meanwhile
 *  5. Validate every variant; retry ValidationError and transient
 *     CapabilityError after base * 2^(attempt-1) ms, up to MAX_ATTEMPTS
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TypedEventBus } from '../../core/event-bus.js'
import {
  CancelledError,
  CapabilityError,
  RequestError,
  ValidationError,
  classifyError,
} from '../../core/errors.js'
import type { LoomError } from '../../core/errors.js'
import type { GenerationProvider } from '../../adapters/generation-provider.js'
import type { ProviderRequest, ProviderResult } from '../../adapters/types.js'
import { finishGeneration, recordAttempt } from '../../persistence/queries/generations.js'
import { nowIso, sleep } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'
import type { TaskDefinition, ValidationRules } from '../task-registry/types.js'
import type { GenerationExecutor } from './generation-executor.js'
import { buildRequestBody } from './request-builder.js'
import { MAX_ATTEMPTS, MAX_VARIANTS, MIN_VARIANTS } from './types.js'
import type { ExecuteRequest, ExecutorResult, RetryPolicy } from './types.js'

const logger = createLogger('generation-executor')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface GenerationExecutorOptions {
  db: BetterSqlite3Database
  eventBus: TypedEventBus
  retry: RetryPolicy
  /** Backoff wait; replaced in tests */
  sleep?: (ms: number) => Promise<void>
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Delay before attempt `failedAttempt + 1` */
export function backoffDelay(baseMs: number, failedAttempt: number): number {
  return baseMs * 2 ** (failedAttempt - 1)
}

/**
 * Validate raw provider variants against the task definition.
 *
 * Extra variants beyond `expected` are ignored.
 *
 * @throws {ValidationError} if fewer than `expected` variants arrived or any is invalid
 */
export function validateVariants(
  definition: TaskDefinition,
  raw: readonly unknown[],
  expected: number,
  rules: ValidationRules,
): Record<string, unknown>[] {
  if (raw.length < expected) {
    const issue = `expected ${String(expected)} variant(s), got ${String(raw.length)}`
    throw new ValidationError(`${definition.label} output failed validation: ${issue}`, [issue])
  }

  const values: Record<string, unknown>[] = []
  const issues: string[] = []
  raw.slice(0, expected).forEach((payload, index) => {
    const outcome = definition.validate(payload, rules)
    if (outcome.ok) {
      values.push(outcome.value)
    } else {
      issues.push(...outcome.issues.map((issue) => (expected > 1 ? `variant ${String(index)}: ${issue}` : issue)))
    }
  })

  if (issues.length > 0) {
    throw new ValidationError(`${definition.label} output failed validation: ${issues.join('; ')}`, issues)
  }
  return values
}

type AttemptOutcome = { ok: true; variants: Record<string, unknown>[] } | { ok: false; error: unknown }

// ---------------------------------------------------------------------------
// GenerationExecutorImpl
// ---------------------------------------------------------------------------

export class GenerationExecutorImpl implements GenerationExecutor {
  private readonly _db: BetterSqlite3Database
  private readonly _eventBus: TypedEventBus
  private readonly _retry: RetryPolicy
  private readonly _sleep: (ms: number) => Promise<void>

  private readonly _active = new Set<string>()
  private readonly _cancelRequested = new Set<string>()

  constructor(options: GenerationExecutorOptions) {
    this._db = options.db
    this._eventBus = options.eventBus
    this._retry = options.retry
    this._sleep = options.sleep ?? sleep
  }

  async execute(request: ExecuteRequest): Promise<ExecutorResult> {
    const { generationId, variants } = request
    if (!Number.isInteger(variants) || variants < MIN_VARIANTS || variants > MAX_VARIANTS) {
      throw new RequestError(`variants must be an integer between ${String(MIN_VARIANTS)} and ${String(MAX_VARIANTS)}`, {
        variants,
      })
    }
    if (this._active.has(generationId)) {
      throw new RequestError(`Generation ${generationId} is already executing`, { generationId })
    }

    this._active.add(generationId)
    try {
      return await this._runChain(request)
    } finally {
      this._active.delete(generationId)
      this._cancelRequested.delete(generationId)
    }
  }

  cancel(generationId: string): boolean {
    if (!this._active.has(generationId)) return false
    this._cancelRequested.add(generationId)
    logger.info({ generationId }, 'Cancellation requested')
    return true
  }

  // -------------------------------------------------------------------------
  // Attempt-chain
  // -------------------------------------------------------------------------

  private async _runChain(request: ExecuteRequest): Promise<ExecutorResult> {
    const { generationId, context, definition, provider, mode } = request
    const providerRequest: ProviderRequest = {
      generationId,
      taskKind: definition.kind,
      body: buildRequestBody(context, definition, request.variants),
      shape: definition.shape,
      variants: request.variants,
    }
    const rules: ValidationRules = { cardinality: context.cardinality, rosterNames: context.rosterNames }

    for (let attempt = 1; ; attempt++) {
      if (this._cancelRequested.has(generationId)) {
        throw this._finishCancelled(generationId, attempt - 1)
      }

      recordAttempt(this._db, generationId, attempt, nowIso())
      this._eventBus.emit('generation:started', { generationId, attempt })
      logger.debug({ generationId, attempt, provider: provider.id }, 'Attempt started')

      let outcome: AttemptOutcome
      try {
        const raw = await this._callWithTimeout(provider, providerRequest)
        outcome = { ok: true, variants: validateVariants(definition, raw.variants, request.variants, rules) }
      } catch (err) {
        outcome = { ok: false, error: err }
      }

      if (this._cancelRequested.has(generationId)) {
        throw this._finishCancelled(generationId, attempt)
      }

      if (outcome.ok) {
        finishGeneration(this._db, generationId, { status: 'completed', finished_at: nowIso() })
        this._eventBus.emit('generation:completed', {
          generationId,
          attemptCount: attempt,
          variantCount: outcome.variants.length,
        })
        logger.info({ generationId, attempt, taskKind: definition.kind }, 'Generation completed')
        return { generationId, variants: outcome.variants, attemptCount: attempt, mode }
      }

      const { retryable, error } = classifyError(outcome.error)
      const willRetry = retryable && attempt < MAX_ATTEMPTS
      this._eventBus.emit('generation:attempt-failed', {
        generationId,
        attempt,
        error: { message: maskSecrets(error.message), code: error.code },
        willRetry,
      })
      logger.warn({ generationId, attempt, code: error.code, willRetry }, `Attempt failed: ${maskSecrets(error.message)}`)

      if (!willRetry) {
        this._finishFailed(generationId, attempt, error)
        throw error
      }

      await this._sleep(backoffDelay(this._retry.backoffBaseMs, attempt))
    }
  }

  /**
   * Race the provider call against the attempt timeout. On timeout the
   * provider's signal is aborted and its eventual result ignored.
   */
  private async _callWithTimeout(provider: GenerationProvider, request: ProviderRequest): Promise<ProviderResult> {
    const timeoutMs = this._retry.attemptTimeoutMs
    const controller = new AbortController()
    let timer: ReturnType<typeof setTimeout> | undefined

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort()
        reject(
          new CapabilityError(`${provider.displayName} did not answer within ${String(timeoutMs)}ms`, 'timeout', true, {
            generationId: request.generationId,
            provider: provider.id,
          }),
        )
      }, timeoutMs)
    })
    const call = (async () => provider.generate(request, { timeoutMs, signal: controller.signal }))()

    try {
      return await Promise.race([call, timeout])
    } finally {
      clearTimeout(timer)
    }
  }

  private _finishFailed(generationId: string, attemptCount: number, error: LoomError): void {
    const message = maskSecrets(error.message)
    finishGeneration(this._db, generationId, {
      status: 'failed',
      error: message,
      error_code: error.code,
      finished_at: nowIso(),
    })
    this._eventBus.emit('generation:failed', { generationId, attemptCount, error: { message, code: error.code } })
    logger.error({ generationId, attemptCount, code: error.code }, `Generation failed: ${message}`)
  }

  private _finishCancelled(generationId: string, attemptCount: number): CancelledError {
    finishGeneration(this._db, generationId, { status: 'cancelled', finished_at: nowIso() })
    this._eventBus.emit('generation:cancelled', { generationId, attemptCount })
    logger.info({ generationId, attemptCount }, 'Generation cancelled')
    return new CancelledError(generationId)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createGenerationExecutor(options: GenerationExecutorOptions): GenerationExecutor {
  return new GenerationExecutorImpl(options)
}
