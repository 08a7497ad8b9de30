/**
 * OrchestratorImpl: concrete implementation of the Orchestrator interface.
 *
 * The createOrchestrator() factory:
 *  1. Creates the database service and the generation pool
 *  2. Instantiates the TypedEventBus
 *  3. Creates all module instances via constructor injection
 *  4. Initializes services via ServiceRegistry
 *  5. Fails generations whose owning engine process has exited
 *  6. Sets up SIGTERM/SIGINT graceful shutdown handlers
 *
 * Modules never import each other's implementations; all wiring is here.
 */

import { hostname } from 'node:os'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { ClaudeCliProvider } from '../adapters/claude-cli-provider.js'
import type { GenerationProvider } from '../adapters/generation-provider.js'
import { ProviderRegistry } from '../adapters/provider-registry.js'
import type { ProviderHealthReport } from '../adapters/provider-registry.js'
import { ScriptedProvider } from '../adapters/scripted-provider.js'
import { createDatabaseService } from '../modules/database/database-service.js'
import type { LoomConfig } from '../modules/config/config-schema.js'
import { createContextAssembler } from '../modules/context-assembler/context-assembler-impl.js'
import type { ContextAssembler } from '../modules/context-assembler/context-assembler.js'
import type { GenerationContext, RevisionFeedback } from '../modules/context-assembler/types.js'
import { applyVariant } from '../modules/draft-applier/draft-applier.js'
import type { ApplyResult } from '../modules/draft-applier/types.js'
import { createDraftLifecycleManager } from '../modules/draft-lifecycle/draft-lifecycle-manager-impl.js'
import type { DraftLifecycleManager } from '../modules/draft-lifecycle/draft-lifecycle-manager.js'
import type { DraftFilter } from '../modules/draft-lifecycle/types.js'
import { createGenerationExecutor } from '../modules/generation-executor/generation-executor-impl.js'
import type { GenerationExecutor } from '../modules/generation-executor/generation-executor.js'
import { MAX_VARIANTS, MIN_VARIANTS } from '../modules/generation-executor/types.js'
import { createGenerationPool } from '../modules/generation-pool/generation-pool-impl.js'
import type { GenerationPool } from '../modules/generation-pool/generation-pool.js'
import { createInstructionResolver } from '../modules/instruction-resolver/instruction-resolver-impl.js'
import type { InstructionResolver } from '../modules/instruction-resolver/instruction-resolver.js'
import type { AddInstructionInput } from '../modules/instruction-resolver/types.js'
import { decideMode } from '../modules/mode-controller/mode-controller.js'
import { getTaskDefinition } from '../modules/task-registry/task-definitions.js'
import type { TaskDefinition } from '../modules/task-registry/types.js'
import { createEntityStore } from '../persistence/entity-store.js'
import type { EntityStore } from '../persistence/entity-store.js'
import { getDraftByGeneration } from '../persistence/queries/drafts.js'
import type { Draft } from '../persistence/queries/drafts.js'
import {
  createGeneration,
  failOrphanedGenerations,
  finishGeneration,
  getGeneration,
} from '../persistence/queries/generations.js'
import type { Generation, RunnerIdentity } from '../persistence/queries/generations.js'
import type { Instruction } from '../persistence/queries/instructions.js'
import { generateId, isProcessAlive, nowIso } from '../utils/helpers.js'
import { createLogger } from '../utils/logger.js'
import { maskSecrets } from '../utils/masking.js'
import { ServiceRegistry } from './di.js'
import { CancelledError, LoomError, NotFoundError, PoolShutdownError, RequestError } from './errors.js'
import { createEventBus } from './event-bus.js'
import type { TypedEventBus } from './event-bus.js'
import type {
  GenerationOutcome,
  GenerationStatusReport,
  Orchestrator,
  OrchestratorConfig,
  SubmitGenerationOptions,
} from './orchestrator.js'
import { PARENT_KIND, formatRef } from './types.js'
import type { EntityRef, GenerationMode, ScopeKind, TaskKind } from './types.js'

const logger = createLogger('orchestrator')

/** Settled outcomes kept for waitForGeneration() unless configured otherwise */
const DEFAULT_RETAINED_OUTCOMES = 256

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Everything the façade drives; built by createOrchestrator() */
export interface OrchestratorDeps {
  db: BetterSqlite3Database
  eventBus: TypedEventBus
  store: EntityStore
  resolver: InstructionResolver
  assembler: ContextAssembler
  executor: GenerationExecutor
  drafts: DraftLifecycleManager
  providers: ProviderRegistry
  pool: GenerationPool
  config: LoomConfig
  runner: RunnerIdentity
  retainedOutcomes: number
}

interface Revision {
  draft: Draft
  feedback: RevisionFeedback
}

/** A submission that passed every check and is ready to queue */
interface PreparedGeneration {
  generationId: string
  taskKind: TaskKind
  definition: TaskDefinition
  context: GenerationContext
  provider: GenerationProvider
  mode: GenerationMode
  variants: number
  revision: Revision | null
}

function errorInfo(err: unknown): { message: string; code: string } {
  if (err instanceof LoomError) return { message: maskSecrets(err.message), code: err.code }
  const message = err instanceof Error ? err.message : String(err)
  return { message: maskSecrets(message), code: 'INTERNAL_ERROR' }
}

function targetOf(draft: Draft): EntityRef {
  return { kind: draft.target_kind, id: draft.target_id }
}

// ---------------------------------------------------------------------------
// OrchestratorImpl
// ---------------------------------------------------------------------------

/** Internal symbol used to expose lifecycle hooks to the factory only */
const INTERNAL = Symbol('OrchestratorImpl.internal')

export class OrchestratorImpl implements Orchestrator {
  readonly eventBus: TypedEventBus
  readonly store: EntityStore

  private readonly _db: BetterSqlite3Database
  private readonly _resolver: InstructionResolver
  private readonly _assembler: ContextAssembler
  private readonly _executor: GenerationExecutor
  private readonly _drafts: DraftLifecycleManager
  private readonly _providers: ProviderRegistry
  private readonly _pool: GenerationPool
  private readonly _config: LoomConfig
  private readonly _registry: ServiceRegistry
  private readonly _runner: RunnerIdentity
  private readonly _retainedOutcomes: number

  private readonly _outcomes = new Map<string, Promise<GenerationOutcome>>()
  /** Ids of settled outcomes still in _outcomes, oldest first */
  private readonly _settled: string[] = []
  private _shutdown = false
  private _sigtermHandler: (() => void) | null = null
  private _sigintHandler: (() => void) | null = null

  constructor(deps: OrchestratorDeps, registry: ServiceRegistry) {
    this.eventBus = deps.eventBus
    this.store = deps.store
    this._db = deps.db
    this._resolver = deps.resolver
    this._assembler = deps.assembler
    this._executor = deps.executor
    this._drafts = deps.drafts
    this._providers = deps.providers
    this._pool = deps.pool
    this._config = deps.config
    this._runner = deps.runner
    this._retainedOutcomes = deps.retainedOutcomes
    this._registry = registry
  }

  // -------------------------------------------------------------------------
  // Generations
  // -------------------------------------------------------------------------

  submitGeneration(taskKind: TaskKind, target: EntityRef, options: SubmitGenerationOptions = {}): string {
    return this._enqueue(this._prepare(taskKind, target, options, null))
  }

  submitForChildren(taskKind: TaskKind, parent: EntityRef, options: SubmitGenerationOptions = {}): string[] {
    const definition = getTaskDefinition(taskKind)
    const kinds = definition.targetKinds.filter((kind) => PARENT_KIND[kind] === parent.kind)
    if (kinds.length === 0) {
      throw new RequestError(`${definition.label} has no targets under a ${parent.kind}`, {
        taskKind,
        parent: formatRef(parent),
      })
    }
    this.store.require(parent)

    // Prepare every child first so one bad context queues nothing
    const prepared = kinds
      .flatMap((kind) => this.store.children(parent, kind))
      .map((child) => this._prepare(taskKind, { kind: child.kind, id: child.id }, options, null))
    logger.info({ taskKind, parent: formatRef(parent), count: prepared.length }, 'Fanning out to children')
    return prepared.map((generation) => this._enqueue(generation))
  }

  waitForGeneration(generationId: string): Promise<GenerationOutcome> {
    const outcome = this._outcomes.get(generationId)
    if (outcome === undefined) {
      return Promise.reject(new NotFoundError('Generation', generationId))
    }
    return outcome
  }

  getGenerationStatus(generationId: string): GenerationStatusReport {
    const generation = this._requireGeneration(generationId)
    return {
      generationId,
      status: generation.status,
      attemptCount: generation.attempt_count,
      error: generation.error,
      errorCode: generation.error_code,
    }
  }

  cancelGeneration(generationId: string): boolean {
    if (this._pool.cancelQueued(generationId)) return true
    return this._executor.cancel(generationId)
  }

  // -------------------------------------------------------------------------
  // Drafts
  // -------------------------------------------------------------------------

  listDrafts(target: EntityRef, filter?: DraftFilter): Draft[] {
    return this._drafts.list(target, filter)
  }

  getDraft(draftId: string): Draft {
    return this._drafts.get(draftId)
  }

  selectDraft(draftId: string, variantIndex: number): Promise<ApplyResult> {
    return this._selectAndApply(draftId, variantIndex)
  }

  rejectDraft(draftId: string): Promise<Draft> {
    const draft = this._drafts.get(draftId)
    return this._drafts.runExclusive(targetOf(draft), draft.content_kind, () => this._drafts.reject(draftId))
  }

  async reviseDraft(draftId: string, feedback: string, options: SubmitGenerationOptions = {}): Promise<string> {
    const draft = this._drafts.get(draftId)
    const target = targetOf(draft)
    const previousVariant = draft.variants[draft.selected_variant ?? 0] ?? null

    // The follow-up must be valid before the draft leaves its current state
    const prepared = this._prepare(draft.content_kind, target, options, {
      draft,
      feedback: { text: feedback.trim(), previousVariant },
    })
    const revised = await this._drafts.runExclusive(target, draft.content_kind, () =>
      this._drafts.revise(draftId, feedback),
    )
    const revision: Revision = {
      draft: revised,
      feedback: { text: revised.feedback ?? feedback.trim(), previousVariant },
    }
    return this._enqueue({ ...prepared, revision })
  }

  // -------------------------------------------------------------------------
  // Instructions
  // -------------------------------------------------------------------------

  addInstruction(input: AddInstructionInput): Instruction {
    return this._resolver.add(input)
  }

  deactivateInstruction(instructionId: string): void {
    this._resolver.deactivate(instructionId)
  }

  listInstructions(scope: { kind: ScopeKind; id: string }): Instruction[] {
    return this._resolver.list(scope)
  }

  // -------------------------------------------------------------------------
  // Misc
  // -------------------------------------------------------------------------

  newProjectRef(): EntityRef {
    return { kind: 'project', id: generateId('project') }
  }

  checkProviders(): Promise<ProviderHealthReport[]> {
    return this._providers.checkAll()
  }

  async shutdown(): Promise<void> {
    if (this._shutdown) return
    this._shutdown = true

    logger.info('Orchestrator shutdown initiated')
    this._removeShutdownHandlers()

    try {
      await this._registry.shutdownAll()
    } catch (err) {
      logger.error({ err }, 'Error during orchestrator shutdown')
    }

    logger.info('Orchestrator shutdown complete')
  }

  // -------------------------------------------------------------------------
  // Submission
  // -------------------------------------------------------------------------

  /**
   * Validate a request and assemble its context. Nothing is written.
   */
  private _prepare(
    taskKind: TaskKind,
    target: EntityRef,
    options: SubmitGenerationOptions,
    revision: Revision | null,
  ): PreparedGeneration {
    if (this._shutdown) {
      throw new RequestError('The engine is shut down')
    }

    const definition = getTaskDefinition(taskKind)
    const variants = options.variants ?? this._config.generation.default_variants
    if (!Number.isInteger(variants) || variants < MIN_VARIANTS || variants > MAX_VARIANTS) {
      throw new RequestError(
        `variants must be an integer between ${String(MIN_VARIANTS)} and ${String(MAX_VARIANTS)}`,
        { variants },
      )
    }

    const userInput = options.userInput?.trim() ?? ''
    if (taskKind === 'project_summary' && revision === null && userInput === '' && this.store.get(target) === undefined) {
      throw new RequestError('A new project needs an idea to summarize', { target: formatRef(target) })
    }

    const provider = this._providers.resolve(taskKind, options.provider)
    const context = this._assembler.assemble({
      taskKind,
      target,
      userInput: userInput === '' ? null : userInput,
      feedback: revision?.feedback ?? null,
    })
    const decision = decideMode(context.instructions, options.mode)
    logger.debug({ target: formatRef(target), taskKind, ...decision }, 'Mode decided')

    return {
      generationId: generateId('gen'),
      taskKind,
      definition,
      context,
      provider,
      mode: decision.mode,
      variants,
      revision,
    }
  }

  private _enqueue(prepared: PreparedGeneration): string {
    const { generationId, taskKind, context, provider } = prepared

    createGeneration(this._db, {
      id: generationId,
      task_kind: taskKind,
      target_kind: context.targetRef.kind,
      target_id: context.targetRef.id,
      provider: provider.id,
      created_at: nowIso(),
      runner_host: this._runner.host,
      runner_pid: this._runner.pid,
    })
    this.eventBus.emit('generation:queued', {
      generationId,
      taskKind,
      target: context.targetRef,
      provider: provider.id,
    })
    logger.info(
      { generationId, taskKind, target: formatRef(context.targetRef), provider: provider.id, mode: prepared.mode },
      'Generation queued',
    )

    const outcome = this._pool
      .submit({ id: generationId, run: () => this._run(prepared) })
      .catch((err: unknown) => this._settleFailure(prepared, err))
    this._outcomes.set(generationId, outcome)
    const retire = (): void => {
      this._retireOutcome(generationId)
    }
    void outcome.then(retire, retire)
    return generationId
  }

  /** Keep the newest settled outcomes; drop the oldest beyond the limit */
  private _retireOutcome(generationId: string): void {
    this._settled.push(generationId)
    while (this._settled.length > this._retainedOutcomes) {
      const oldest = this._settled.shift()
      if (oldest !== undefined) this._outcomes.delete(oldest)
    }
  }

  /** The pool job: one attempt-chain, then the draft it produced */
  private async _run(prepared: PreparedGeneration): Promise<GenerationOutcome> {
    const { generationId, taskKind, context, mode, revision } = prepared

    const result = await this._executor.execute({
      generationId,
      context,
      definition: prepared.definition,
      provider: prepared.provider,
      mode,
      variants: prepared.variants,
    })

    const { draft } = await this._drafts.create({
      target: context.targetRef,
      contentKind: taskKind,
      variants: result.variants,
      generationId,
      createdFromDraftId: revision?.draft.id ?? null,
      feedback: revision?.feedback.text ?? null,
    })

    if (mode === 'review') {
      return this._outcome(generationId, mode, null, null)
    }

    try {
      const applied = await this._selectAndApply(draft.id, 0)
      return this._outcome(generationId, mode, applied, null)
    } catch (err) {
      if (err instanceof LoomError) {
        return this._outcome(generationId, mode, null, errorInfo(err))
      }
      throw err
    }
  }

  /**
   * Turn a rejected job into an outcome. Generations that never started
   * get their final status here; the executor records the rest.
   */
  private _settleFailure(prepared: PreparedGeneration, err: unknown): GenerationOutcome {
    const { generationId, mode } = prepared
    const info = errorInfo(err)
    const record = getGeneration(this._db, generationId)

    if (record?.status === 'queued') {
      if (err instanceof CancelledError) {
        finishGeneration(this._db, generationId, { status: 'cancelled', finished_at: nowIso() })
        this.eventBus.emit('generation:cancelled', { generationId, attemptCount: 0 })
        logger.info({ generationId }, 'Queued generation cancelled')
      } else if (err instanceof PoolShutdownError) {
        finishGeneration(this._db, generationId, {
          status: 'failed',
          error: info.message,
          error_code: info.code,
          finished_at: nowIso(),
        })
        this.eventBus.emit('generation:failed', { generationId, attemptCount: 0, error: info })
      }
    }

    if (!(err instanceof LoomError)) {
      logger.error({ err, generationId }, 'Unexpected error while running generation')
    }
    return this._outcome(generationId, mode, null, info)
  }

  private _outcome(
    generationId: string,
    mode: GenerationMode,
    applied: ApplyResult | null,
    error: { message: string; code: string } | null,
  ): GenerationOutcome {
    return {
      generation: this._requireGeneration(generationId),
      draft: getDraftByGeneration(this._db, generationId) ?? null,
      mode,
      applied,
      error,
    }
  }

  private _requireGeneration(generationId: string): Generation {
    const generation = getGeneration(this._db, generationId)
    if (generation === undefined) {
      throw new NotFoundError('Generation', generationId)
    }
    return generation
  }

  // -------------------------------------------------------------------------
  // Apply
  // -------------------------------------------------------------------------

  /**
   * pending → selected → applied under the (target, content kind) lock.
   * On a failed write the draft goes to rejected with the error attached.
   */
  private async _selectAndApply(draftId: string, variantIndex: number): Promise<ApplyResult> {
    const draft = this._drafts.get(draftId)
    const target = targetOf(draft)

    return this._drafts.runExclusive(target, draft.content_kind, () => {
      const selected = this._drafts.select(draftId, variantIndex)
      const definition = getTaskDefinition(selected.content_kind)

      let applied: ApplyResult
      try {
        applied = applyVariant(this.store, definition, { target, payload: selected.variants[variantIndex] })
      } catch (err) {
        const { message } = errorInfo(err)
        this._drafts.markApplyFailed(draftId, message)
        logger.warn({ draftId, target: formatRef(target) }, `Apply failed: ${message}`)
        throw err
      }

      this._drafts.markApplied(draftId)
      this.eventBus.emit('draft:applied', {
        draftId,
        target,
        createdEntityIds: applied.created.map((entity) => entity.id),
      })
      return applied
    })
  }

  // -------------------------------------------------------------------------
  // Signal handling
  // -------------------------------------------------------------------------

  private _registerShutdownHandlers(): void {
    if (this._sigtermHandler !== null) return

    const makeHandler = (signal: string) => () => {
      logger.info({ signal }, 'Received signal, initiating graceful shutdown')
      this.shutdown()
        .then(() => {
          process.exit(0)
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during signal-triggered shutdown')
          process.exit(1)
        })
    }

    this._sigtermHandler = makeHandler('SIGTERM')
    this._sigintHandler = makeHandler('SIGINT')
    process.once('SIGTERM', this._sigtermHandler)
    process.once('SIGINT', this._sigintHandler)
  }

  private _removeShutdownHandlers(): void {
    if (this._sigtermHandler !== null) {
      process.removeListener('SIGTERM', this._sigtermHandler)
      this._sigtermHandler = null
    }
    if (this._sigintHandler !== null) {
      process.removeListener('SIGINT', this._sigintHandler)
      this._sigintHandler = null
    }
  }

  /**
   * Internal accessor used exclusively by the createOrchestrator factory.
   * @internal
   */
  [INTERNAL](): { registerShutdownHandlers: () => void } {
    return { registerShutdownHandlers: () => this._registerShutdownHandlers() }
  }
}

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

/**
 * Registry holding the enabled built-in providers plus `extra`.
 */
export function buildProviderRegistry(config: LoomConfig, extra: GenerationProvider[] = []): ProviderRegistry {
  const registry = new ProviderRegistry(config.routing)
  const claude = config.providers['claude-cli']
  if (claude.enabled) {
    registry.register(new ClaudeCliProvider({ cliPath: claude.cli_path, model: claude.model }))
  }
  if (config.providers.scripted.enabled) {
    registry.register(new ScriptedProvider())
  }
  for (const provider of extra) {
    registry.register(provider)
  }
  return registry
}

// ---------------------------------------------------------------------------
// createOrchestrator factory
// ---------------------------------------------------------------------------

/**
 * Initialize the engine with all modules wired via dependency injection.
 *
 * @param config - Orchestrator configuration
 * @returns Initialized Orchestrator instance
 */
export async function createOrchestrator(config: OrchestratorConfig): Promise<Orchestrator> {
  logger.info({ databasePath: config.databasePath }, 'Initializing orchestrator')
  const settings = config.config

  // Step 1: Resource-owning services, in dependency order
  const eventBus = createEventBus()
  const databaseService = createDatabaseService(config.databasePath)
  const pool = createGenerationPool(settings.global.max_concurrent_generations)

  const registry = new ServiceRegistry()
  registry.register('database', databaseService)
  registry.register('generationPool', pool)

  try {
    await registry.initializeAll()
  } catch (err) {
    logger.error({ err }, 'Service initialization failed')
    throw err
  }

  const db = databaseService.db
  const runner: RunnerIdentity = { host: hostname(), pid: process.pid, isAlive: isProcessAlive }
  const orphaned = failOrphanedGenerations(db, runner, nowIso())
  if (orphaned.length > 0) {
    logger.warn({ generationIds: orphaned }, 'Failed generations whose engine process has exited')
  }

  // Step 2: Engine components
  const store = createEntityStore(db)
  const resolver = createInstructionResolver({ db, store })
  const assembler = createContextAssembler({
    store,
    resolver,
    tokenBudget: settings.context.token_budget,
    cardinality: settings.cardinality,
  })
  const executor = createGenerationExecutor({
    db,
    eventBus,
    retry: {
      backoffBaseMs: settings.generation.backoff_base_ms,
      attemptTimeoutMs: settings.generation.attempt_timeout_ms,
    },
    sleep: config.sleep,
  })
  const drafts = createDraftLifecycleManager({ db, eventBus })
  const providers = buildProviderRegistry(settings, config.providers)

  const orchestrator = new OrchestratorImpl(
    {
      db,
      eventBus,
      store,
      resolver,
      assembler,
      executor,
      drafts,
      providers,
      pool,
      config: settings,
      runner,
      retainedOutcomes: config.retainedOutcomes ?? DEFAULT_RETAINED_OUTCOMES,
    },
    registry,
  )

  // Step 3: Register graceful shutdown handlers for SIGTERM/SIGINT
  if (config.handleSignals ?? true) {
    orchestrator[INTERNAL]().registerShutdownHandlers()
  }

  logger.info({ providers: providers.getAll().map((p) => p.id) }, 'Orchestrator ready')
  return orchestrator
}
