/**
 * Unit tests for GenerationExecutorImpl: retry policy, timeouts,
 * cancellation and variant validation.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import type { Mock } from 'vitest'
import { createGenerationExecutor, backoffDelay } from '../generation-executor-impl.js'
import type { GenerationExecutor } from '../generation-executor.js'
import type { ExecuteRequest } from '../types.js'
import { createEventBus } from '../../../core/event-bus.js'
import type { TypedEventBus } from '../../../core/event-bus.js'
import { CancelledError, CapabilityError, RequestError, ValidationError } from '../../../core/errors.js'
import type { GenerationProvider } from '../../../adapters/generation-provider.js'
import type { ProviderCallOptions, ProviderRequest, ProviderResult } from '../../../adapters/types.js'
import { createGeneration, getGeneration } from '../../../persistence/queries/generations.js'
import { createContextAssembler } from '../../context-assembler/context-assembler-impl.js'
import { createInstructionResolver } from '../../instruction-resolver/instruction-resolver-impl.js'
import { DEFAULT_CARDINALITY } from '../../config/defaults.js'
import { TASK_DEFINITIONS } from '../../task-registry/task-definitions.js'
import { seedStory } from '../../../../test/fixtures/story.js'
import type { SeededStory } from '../../../../test/fixtures/story.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type GenerateFn = (request: ProviderRequest, options: ProviderCallOptions) => Promise<ProviderResult>

function createFakeProvider(): { provider: GenerationProvider; generate: Mock<GenerateFn> } {
  const generate = vi.fn<GenerateFn>()
  const provider: GenerationProvider = {
    id: 'fake',
    displayName: 'Fake provider',
    healthCheck: async () => ({ healthy: true }),
    generate,
  }
  return { provider, generate }
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let settle: (value: T) => void = () => undefined
  const promise = new Promise<T>((resolve) => {
    settle = resolve
  })
  return { promise, resolve: (value: T) => settle(value) }
}

const VALID = { variants: [{ summary: 'Mira corners Oren in the cargo bay.' }] }

let story: SeededStory
let bus: TypedEventBus
let sleep: Mock<(ms: number) => Promise<void>>
let executor: GenerationExecutor
let fake: ReturnType<typeof createFakeProvider>

function request(overrides: Partial<ExecuteRequest> = {}): ExecuteRequest {
  const resolver = createInstructionResolver({ db: story.db, store: story.store })
  const assembler = createContextAssembler({
    store: story.store,
    resolver,
    tokenBudget: 4000,
    cardinality: DEFAULT_CARDINALITY,
  })
  return {
    generationId: 'gen-1',
    context: assembler.assemble({ taskKind: 'scene_summary', target: { kind: 'scene', id: 'scene-1' } }),
    definition: TASK_DEFINITIONS.scene_summary,
    provider: fake.provider,
    mode: 'review',
    variants: 1,
    ...overrides,
  }
}

beforeEach(() => {
  story = seedStory()
  bus = createEventBus()
  sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined)
  fake = createFakeProvider()
  executor = createGenerationExecutor({
    db: story.db,
    eventBus: bus,
    retry: { backoffBaseMs: 500, attemptTimeoutMs: 1000 },
    sleep,
  })
  createGeneration(story.db, {
    id: 'gen-1',
    task_kind: 'scene_summary',
    target_kind: 'scene',
    target_id: 'scene-1',
    provider: 'fake',
    created_at: '2026-01-01T00:00:00.000Z',
    runner_host: 'studio-1',
    runner_pid: 4242,
  })
})

// ---------------------------------------------------------------------------
// Retry policy
// ---------------------------------------------------------------------------

describe('retry policy', () => {
  it('completes with attempt_count 3 after two transient failures', async () => {
    fake.generate
      .mockRejectedValueOnce(new CapabilityError('slow down', 'rate_limit', true))
      .mockRejectedValueOnce(new CapabilityError('try later', 'unavailable', true))
      .mockResolvedValueOnce(VALID)

    const result = await executor.execute(request())

    expect(result.attemptCount).toBe(3)
    expect(result.variants).toEqual([{ summary: 'Mira corners Oren in the cargo bay.' }])
    expect(getGeneration(story.db, 'gen-1')).toMatchObject({ status: 'completed', attempt_count: 3, error: null })
    expect(sleep.mock.calls).toEqual([[500], [1000]])
  })

  it('fails with attempt_count 1 on a permanent failure', async () => {
    fake.generate.mockRejectedValueOnce(new CapabilityError('refused by policy', 'policy_rejection', false))

    await expect(executor.execute(request())).rejects.toThrow('refused by policy')

    expect(fake.generate).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
    expect(getGeneration(story.db, 'gen-1')).toMatchObject({
      status: 'failed',
      attempt_count: 1,
      error: 'refused by policy',
      error_code: 'CAPABILITY_ERROR',
    })
  })

  it('retries invalid output and fails with the last validation error after three attempts', async () => {
    fake.generate.mockResolvedValue({ variants: [{ summary: '' }] })

    const error: unknown = await executor.execute(request()).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ValidationError)
    expect(fake.generate).toHaveBeenCalledTimes(3)
    expect(getGeneration(story.db, 'gen-1')).toMatchObject({
      status: 'failed',
      attempt_count: 3,
      error_code: 'VALIDATION_ERROR',
    })
  })

  it('treats unknown errors as transient', async () => {
    fake.generate.mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce(VALID)

    const result = await executor.execute(request())
    expect(result.attemptCount).toBe(2)
  })

  it('sends the same request body on every attempt', async () => {
    fake.generate
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce(VALID)

    await executor.execute(request())

    const bodies = fake.generate.mock.calls.map(([req]) => req.body)
    expect(new Set(bodies).size).toBe(1)
  })

  it('publishes attempt and completion events in order', async () => {
    const seen: string[] = []
    bus.on('generation:started', ({ attempt }) => seen.push(`started ${String(attempt)}`))
    bus.on('generation:attempt-failed', ({ attempt, willRetry }) =>
      seen.push(`failed ${String(attempt)} retry=${String(willRetry)}`),
    )
    bus.on('generation:completed', ({ attemptCount }) => seen.push(`completed ${String(attemptCount)}`))
    fake.generate.mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce(VALID)

    await executor.execute(request())

    expect(seen).toEqual(['started 1', 'failed 1 retry=true', 'started 2', 'completed 2'])
  })
})

describe('backoffDelay', () => {
  it('doubles from the base delay', () => {
    expect([1, 2, 3].map((attempt) => backoffDelay(250, attempt))).toEqual([250, 500, 1000])
  })
})

// ---------------------------------------------------------------------------
// Timeouts
// ---------------------------------------------------------------------------

describe('attempt timeout', () => {
  it('counts a call that outlives the timeout as a transient failure and aborts its signal', async () => {
    executor = createGenerationExecutor({
      db: story.db,
      eventBus: bus,
      retry: { backoffBaseMs: 500, attemptTimeoutMs: 20 },
      sleep,
    })
    fake.generate.mockImplementation(() => new Promise<ProviderResult>(() => undefined))

    await expect(executor.execute(request())).rejects.toThrow(CapabilityError)

    expect(fake.generate).toHaveBeenCalledTimes(3)
    expect(fake.generate.mock.calls[0]?.[1].signal.aborted).toBe(true)
    expect(getGeneration(story.db, 'gen-1')).toMatchObject({
      status: 'failed',
      attempt_count: 3,
      error: 'Fake provider did not answer within 20ms',
    })
  })
})

// ---------------------------------------------------------------------------
// Cancellation
// ---------------------------------------------------------------------------

describe('cancellation', () => {
  it('discards a result that returns after cancellation and marks the record cancelled', async () => {
    const pending = deferred<ProviderResult>()
    fake.generate.mockReturnValueOnce(pending.promise)
    const cancelled = vi.fn()
    bus.on('generation:cancelled', cancelled)

    const run = executor.execute(request())
    await vi.waitFor(() => expect(fake.generate).toHaveBeenCalledTimes(1))
    expect(executor.cancel('gen-1')).toBe(true)
    pending.resolve(VALID)

    await expect(run).rejects.toThrow(CancelledError)
    expect(getGeneration(story.db, 'gen-1')).toMatchObject({ status: 'cancelled', attempt_count: 1 })
    expect(cancelled).toHaveBeenCalledWith({ generationId: 'gen-1', attemptCount: 1 })
  })

  it('stops at the retry boundary instead of starting another attempt', async () => {
    const pending = deferred<ProviderResult>()
    fake.generate.mockReturnValueOnce(pending.promise.then(() => Promise.reject(new Error('flaky'))))

    const run = executor.execute(request())
    await vi.waitFor(() => expect(fake.generate).toHaveBeenCalledTimes(1))
    executor.cancel('gen-1')
    pending.resolve(VALID)

    await expect(run).rejects.toThrow(CancelledError)
    expect(fake.generate).toHaveBeenCalledTimes(1)
  })

  it('returns false for a generation that is not executing', () => {
    expect(executor.cancel('gen-unknown')).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

describe('variants', () => {
  it('passes the requested variant count to the provider and keeps only that many', async () => {
    fake.generate.mockResolvedValueOnce({
      variants: [{ summary: 'One.' }, { summary: 'Two.' }, { summary: 'Three.' }],
    })

    const result = await executor.execute(request({ variants: 2 }))

    expect(fake.generate.mock.calls[0]?.[0].variants).toBe(2)
    expect(result.variants).toEqual([{ summary: 'One.' }, { summary: 'Two.' }])
  })

  it('rejects a response with too few variants', async () => {
    fake.generate.mockResolvedValue({ variants: [{ summary: 'Only one.' }] })

    await expect(executor.execute(request({ variants: 2 }))).rejects.toThrow(
      'Scene summary output failed validation: expected 2 variant(s), got 1',
    )
  })

  it('prefixes issues with the variant index when several variants are requested', async () => {
    fake.generate.mockResolvedValue({ variants: [{ summary: 'Fine.' }, { nothing: true }] })

    const error: unknown = await executor.execute(request({ variants: 2 })).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ValidationError)
    if (error instanceof ValidationError) {
      expect(error.issues).toEqual(['variant 1: summary: Required'])
    }
  })

  it('rejects a variant count outside 1-5 before calling the provider', async () => {
    await expect(executor.execute(request({ variants: 6 }))).rejects.toThrow(RequestError)
    expect(fake.generate).not.toHaveBeenCalled()
  })
})
