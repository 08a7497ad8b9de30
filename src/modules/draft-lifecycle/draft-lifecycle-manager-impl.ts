/**
 * DraftLifecycleManagerImpl: drives drafts through the review state machine.
 *
 * Every status change goes through DRAFT_TRANSITIONS; anything not listed
 * there raises IllegalTransitionError and leaves the draft untouched.
 * Events are published only after the database write has committed.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { EngineEvents } from '../../core/event-bus.types.js'
import { ConflictError, IllegalTransitionError, NotFoundError, RequestError } from '../../core/errors.js'
import type { ContentKind, EntityRef } from '../../core/types.js'
import { formatRef } from '../../core/types.js'
import {
  getDraft,
  getPendingDraft,
  insertDraft,
  listDraftsForTarget,
  updateDraftStatus,
} from '../../persistence/queries/drafts.js'
import type { Draft, UpdateDraftStatusInput } from '../../persistence/queries/drafts.js'
import { generateId, nowIso } from '../../utils/helpers.js'
import { KeyedLock } from '../../utils/keyed-lock.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'
import { MAX_VARIANTS, MIN_VARIANTS } from '../generation-executor/types.js'
import type { DraftLifecycleManager } from './draft-lifecycle-manager.js'
import { nextStatus } from './types.js'
import type { CreateDraftInput, CreateDraftResult, DraftEvent, DraftFilter } from './types.js'

const logger = createLogger('draft-lifecycle')

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function draftLockKey(target: EntityRef, contentKind: ContentKind): string {
  return `${formatRef(target)}#${contentKind}`
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE'
}

type TransitionEvent = EngineEvents['draft:transitioned']

type TransitionExtras = Omit<UpdateDraftStatusInput, 'status' | 'updated_at'>

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DraftLifecycleManagerOptions {
  db: BetterSqlite3Database
  eventBus: TypedEventBus
  /** Shared with other writers of drafts and entities; a private lock otherwise */
  lock?: KeyedLock
}

// ---------------------------------------------------------------------------
// DraftLifecycleManagerImpl
// ---------------------------------------------------------------------------

export class DraftLifecycleManagerImpl implements DraftLifecycleManager {
  private readonly _db: BetterSqlite3Database
  private readonly _eventBus: TypedEventBus
  private readonly _lock: KeyedLock

  constructor(options: DraftLifecycleManagerOptions) {
    this._db = options.db
    this._eventBus = options.eventBus
    this._lock = options.lock ?? new KeyedLock()
  }

  // -------------------------------------------------------------------------
  // Creation
  // -------------------------------------------------------------------------

  async create(input: CreateDraftInput): Promise<CreateDraftResult> {
    const count = input.variants.length
    if (count < MIN_VARIANTS || count > MAX_VARIANTS) {
      throw new RequestError(
        `A draft holds ${String(MIN_VARIANTS)}-${String(MAX_VARIANTS)} variants, got ${String(count)}`,
        { variants: count },
      )
    }
    return this._lock.runExclusive(draftLockKey(input.target, input.contentKind), () => this._createLocked(input))
  }

  private _createLocked(input: CreateDraftInput): CreateDraftResult {
    const { target, contentKind } = input
    const draftId = generateId('draft')
    const now = nowIso()
    const transitions: TransitionEvent[] = []
    let supersededPendingId: string | null = null

    const supersede = (draft: Draft): void => {
      transitions.push(this._write(draft, 'supersede', now))
    }

    try {
      this._db.transaction(() => {
        const pending = getPendingDraft(this._db, target.id, contentKind)
        if (pending !== undefined) {
          supersede(pending)
          supersededPendingId = pending.id
        }

        if (input.createdFromDraftId != null) {
          const source = getDraft(this._db, input.createdFromDraftId)
          if (source === undefined) {
            throw new NotFoundError('Draft', input.createdFromDraftId)
          }
          if (source.target_id !== target.id || source.content_kind !== contentKind) {
            throw new RequestError(`Draft ${source.id} belongs to a different target or content kind`, {
              draftId: source.id,
            })
          }
          if (source.status === 'revised') {
            supersede(source)
          }
        }

        insertDraft(this._db, {
          id: draftId,
          target_kind: target.kind,
          target_id: target.id,
          content_kind: contentKind,
          variants: input.variants,
          feedback: input.feedback ?? null,
          created_from_draft_id: input.createdFromDraftId ?? null,
          generation_id: input.generationId,
          created_at: now,
        })
      })()
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError(`Another pending ${contentKind} draft exists for ${formatRef(target)}`, {
          target: formatRef(target),
          contentKind,
        })
      }
      throw err
    }

    for (const event of transitions) {
      this._eventBus.emit('draft:transitioned', event)
    }
    this._eventBus.emit('draft:created', {
      draftId,
      target,
      contentKind,
      variantCount: input.variants.length,
      supersededDraftId: supersededPendingId,
    })
    logger.info(
      { draftId, target: formatRef(target), contentKind, superseded: transitions.map((t) => t.draftId) },
      'Draft created',
    )

    return { draft: this.get(draftId), supersededDraftIds: transitions.map((t) => t.draftId) }
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  get(draftId: string): Draft {
    const draft = getDraft(this._db, draftId)
    if (draft === undefined) {
      throw new NotFoundError('Draft', draftId)
    }
    return draft
  }

  list(target: EntityRef, filter: DraftFilter = {}): Draft[] {
    return listDraftsForTarget(this._db, target.id, filter).filter((d) => d.target_kind === target.kind)
  }

  // -------------------------------------------------------------------------
  // Transitions
  // -------------------------------------------------------------------------

  select(draftId: string, variantIndex: number): Draft {
    const draft = this.get(draftId)
    this._assertLegal(draft, 'select')
    if (!Number.isInteger(variantIndex) || variantIndex < 0 || variantIndex >= draft.variants.length) {
      throw new RequestError(
        `Variant index ${String(variantIndex)} is out of range for draft ${draftId} (${String(draft.variants.length)} variants)`,
        { draftId, variantIndex },
      )
    }
    return this._transition(draft, 'select', { selected_variant: variantIndex })
  }

  reject(draftId: string): Draft {
    return this._transition(this.get(draftId), 'reject')
  }

  revise(draftId: string, feedback: string): Draft {
    const text = feedback.trim()
    if (text === '') {
      throw new RequestError('Revision feedback must not be empty', { draftId })
    }
    return this._transition(this.get(draftId), 'revise', { feedback: text })
  }

  markApplied(draftId: string): Draft {
    return this._transition(this.get(draftId), 'apply')
  }

  markApplyFailed(draftId: string, systemError: string): Draft {
    return this._transition(this.get(draftId), 'apply_failed', { system_error: maskSecrets(systemError) })
  }

  runExclusive<T>(target: EntityRef, contentKind: ContentKind, fn: () => Promise<T> | T): Promise<T> {
    return this._lock.runExclusive(draftLockKey(target, contentKind), fn)
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private _assertLegal(draft: Draft, event: DraftEvent): void {
    if (nextStatus(draft.status, event) === null) {
      throw new IllegalTransitionError(draft.id, draft.status, event)
    }
  }

  private _transition(draft: Draft, event: DraftEvent, extras: TransitionExtras = {}): Draft {
    const transition = this._write(draft, event, nowIso(), extras)
    this._eventBus.emit('draft:transitioned', transition)
    logger.debug(transition, 'Draft transitioned')
    return this.get(draft.id)
  }

  /** Validate and persist one transition; the caller publishes the event */
  private _write(draft: Draft, event: DraftEvent, now: string, extras: TransitionExtras = {}): TransitionEvent {
    const to = nextStatus(draft.status, event)
    if (to === null) {
      throw new IllegalTransitionError(draft.id, draft.status, event)
    }
    updateDraftStatus(this._db, draft.id, { ...extras, status: to, updated_at: now })
    return { draftId: draft.id, from: draft.status, to, event }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createDraftLifecycleManager(options: DraftLifecycleManagerOptions): DraftLifecycleManager {
  return new DraftLifecycleManagerImpl(options)
}
