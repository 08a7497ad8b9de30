/**
 * StoryLoom - Main module exports
 * Public API surface for embedding the generation engine
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export * from './utils/helpers.js'
export { maskSecrets } from './utils/masking.js'

// Orchestrator
export { createOrchestrator } from './core/orchestrator-impl.js'
export type {
  Orchestrator,
  OrchestratorConfig,
  SubmitGenerationOptions,
  GenerationStatusReport,
  GenerationOutcome,
} from './core/orchestrator.js'

// Event Bus
export type { TypedEventBus, EngineEventName, EngineEventHandler, Unsubscribe } from './core/event-bus.js'
export type { EngineEvents, EventError } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Providers
export type {
  GenerationProvider,
  ProviderRequest,
  ProviderCallOptions,
  ProviderResult,
  ProviderHealthResult,
} from './adapters/generation-provider.js'
export { ProviderRegistry } from './adapters/provider-registry.js'
export type { ProviderHealthReport } from './adapters/provider-registry.js'
export { ClaudeCliProvider } from './adapters/claude-cli-provider.js'
export type { ClaudeCliProviderOptions } from './adapters/claude-cli-provider.js'
export { ScriptedProvider } from './adapters/scripted-provider.js'

// Configuration
export * from './modules/config/index.js'

// Persistence
export { createEntityStore } from './persistence/entity-store.js'
export type { EntityStore, CreateEntityInput, DeleteResult } from './persistence/entity-store.js'
export { createDatabaseService, MEMORY_DATABASE } from './persistence/database.js'
export type { DatabaseService } from './persistence/database.js'
export type { ContentEntity } from './persistence/queries/entities.js'
export type { Draft } from './persistence/queries/drafts.js'
export type { Generation } from './persistence/queries/generations.js'
export type { Instruction } from './persistence/queries/instructions.js'

// Engine modules
export { TASK_DEFINITIONS, getTaskDefinition } from './modules/task-registry/index.js'
export type { TaskDefinition, ValidationOutcome } from './modules/task-registry/index.js'
export { parseDirective } from './modules/instruction-resolver/index.js'
export type { AddInstructionInput, ResolvedInstruction } from './modules/instruction-resolver/index.js'
export type { GenerationContext } from './modules/context-assembler/index.js'
export { DRAFT_TRANSITIONS, nextStatus } from './modules/draft-lifecycle/index.js'
export type { DraftEvent, DraftFilter } from './modules/draft-lifecycle/index.js'
export { MAX_ATTEMPTS, MIN_VARIANTS, MAX_VARIANTS } from './modules/generation-executor/index.js'
export { decideMode } from './modules/mode-controller/index.js'
export type { ModeDecision } from './modules/mode-controller/index.js'
export type { ApplyResult } from './modules/draft-applier/index.js'
export type { GenerationPool, PoolJob } from './modules/generation-pool/index.js'
