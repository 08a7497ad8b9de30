/**
 * draft-lifecycle module: public API re-exports
 */

export type { DraftLifecycleManager } from './draft-lifecycle-manager.js'

export {
  DraftLifecycleManagerImpl,
  createDraftLifecycleManager,
  draftLockKey,
} from './draft-lifecycle-manager-impl.js'

export type { DraftLifecycleManagerOptions } from './draft-lifecycle-manager-impl.js'

export { DRAFT_EVENTS, DRAFT_TRANSITIONS, nextStatus } from './types.js'

export type { CreateDraftInput, CreateDraftResult, DraftEvent, DraftFilter } from './types.js'
