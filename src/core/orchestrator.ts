/**
 * Orchestrator interface: the public contract for the generation engine.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createOrchestrator()` from orchestrator-impl.ts.
 */

import type { GenerationProvider } from '../adapters/generation-provider.js'
import type { ProviderHealthReport } from '../adapters/provider-registry.js'
import type { LoomConfig } from '../modules/config/config-schema.js'
import type { ApplyResult } from '../modules/draft-applier/types.js'
import type { DraftFilter } from '../modules/draft-lifecycle/types.js'
import type { AddInstructionInput } from '../modules/instruction-resolver/types.js'
import type { EntityStore } from '../persistence/entity-store.js'
import type { Draft } from '../persistence/queries/drafts.js'
import type { Generation } from '../persistence/queries/generations.js'
import type { Instruction } from '../persistence/queries/instructions.js'
import type { TypedEventBus } from './event-bus.js'
import type { EntityRef, GenerationMode, GenerationStatus, ScopeKind, TaskKind } from './types.js'

// ---------------------------------------------------------------------------
// OrchestratorConfig
// ---------------------------------------------------------------------------

/**
 * Configuration required to initialize the orchestrator.
 */
export interface OrchestratorConfig {
  /** Path to the SQLite database file (e.g., ".storyloom/state.db"), or ":memory:" */
  databasePath: string

  /** Fully merged configuration (see ConfigSystem) */
  config: LoomConfig

  /**
   * Providers registered in addition to the enabled built-in ones; a
   * provider with a built-in id replaces it.
   */
  providers?: GenerationProvider[]

  /**
   * Install SIGTERM/SIGINT handlers that shut the engine down.
   * @default true
   */
  handleSignals?: boolean

  /** Backoff wait between attempts; replaced in tests */
  sleep?: (ms: number) => Promise<void>

  /**
   * Settled outcomes kept for waitForGeneration(); older ones are dropped.
   * @default 256
   */
  retainedOutcomes?: number
}

// ---------------------------------------------------------------------------
// Requests and results
// ---------------------------------------------------------------------------

export interface SubmitGenerationOptions {
  /** Beats any directive found in the resolved instructions */
  mode?: GenerationMode
  /** Explicit provider id; routing rules apply otherwise */
  provider?: string
  /** Variants to request, 1-5; the configured default otherwise */
  variants?: number
  /** Free-text idea carried into the context */
  userInput?: string
}

export interface GenerationStatusReport {
  generationId: string
  status: GenerationStatus
  attemptCount: number
  error: string | null
  errorCode: string | null
}

/** Final state of one submission once its attempt-chain and draft handling finish */
export interface GenerationOutcome {
  generation: Generation
  /** The draft the generation produced, in its current state */
  draft: Draft | null
  mode: GenerationMode
  /** Set when direct mode applied the draft */
  applied: ApplyResult | null
  /** What ended the chain or its draft handling unsuccessfully */
  error: { message: string; code: string } | null
}

// ---------------------------------------------------------------------------
// Orchestrator interface
// ---------------------------------------------------------------------------

/**
 * Generation engine façade.
 *
 * Lifecycle:
 *  1. Create via `createOrchestrator(config)`
 *  2. Submit generations; they run through the bounded pool
 *  3. On SIGTERM/SIGINT, graceful shutdown is triggered automatically
 *  4. Call `shutdown()` explicitly for programmatic shutdown
 */
export interface Orchestrator {
  /** Progress events for generations and drafts */
  readonly eventBus: TypedEventBus

  /** Content hierarchy read access for callers such as the CLI */
  readonly store: EntityStore

  /**
   * Resolve instructions, assemble the context and queue one generation.
   * Context problems surface here, before any generation record exists.
   *
   * @returns the new generation id
   * @throws {ContextError} | {RequestError} | {ConfigError}
   */
  submitGeneration(taskKind: TaskKind, target: EntityRef, options?: SubmitGenerationOptions): string

  /**
   * Submit `taskKind` once for every live child of `parent` the task can
   * target. The requests are independent and share the bounded pool.
   *
   * @returns generation ids in child position order
   */
  submitForChildren(taskKind: TaskKind, parent: EntityRef, options?: SubmitGenerationOptions): string[]

  /**
   * Resolves once the generation and its draft handling have finished.
   * Outcomes of generations this engine submitted stay available until
   * `retainedOutcomes` newer ones have settled.
   *
   * @throws {NotFoundError} for generations this engine did not submit or no longer retains
   */
  waitForGeneration(generationId: string): Promise<GenerationOutcome>

  /** @throws {NotFoundError} */
  getGenerationStatus(generationId: string): GenerationStatusReport

  /**
   * Stop a generation: a queued one never starts; a running one stops at
   * its next retry boundary and its in-flight result is discarded.
   *
   * @returns false if the generation is not queued or running
   */
  cancelGeneration(generationId: string): boolean

  listDrafts(target: EntityRef, filter?: DraftFilter): Draft[]

  /** @throws {NotFoundError} */
  getDraft(draftId: string): Draft

  /**
   * Select a variant and apply it to the hierarchy in one step.
   * A failed apply leaves the draft rejected with the system error attached
   * and rethrows.
   *
   * @throws {IllegalTransitionError} | {RequestError} | {ValidationError}
   */
  selectDraft(draftId: string, variantIndex: number): Promise<ApplyResult>

  rejectDraft(draftId: string): Promise<Draft>

  /**
   * Attach feedback to a draft and queue a follow-up generation whose
   * context carries the feedback and the variant being revised.
   *
   * @returns the new generation id
   */
  reviseDraft(draftId: string, feedback: string, options?: SubmitGenerationOptions): Promise<string>

  addInstruction(input: AddInstructionInput): Instruction
  deactivateInstruction(instructionId: string): void
  listInstructions(scope: { kind: ScopeKind; id: string }): Instruction[]

  /** A fresh id for a project a project summary will create */
  newProjectRef(): EntityRef

  checkProviders(): Promise<ProviderHealthReport[]>

  /**
   * Stop accepting work, reject queued generations, wait for running ones,
   * and close the database.
   */
  shutdown(): Promise<void>
}
