/**
 * EntityStore: key-addressed document store for the content hierarchy.
 *
 * Each entity kind is a flat collection keyed by (kind, id); the tree is
 * expressed through parent columns. The store enforces the parent rules of
 * the hierarchy on write and owns lineage cascades on delete.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { NotFoundError, ScopeError } from '../core/errors.js'
import type { EntityKind, EntityRef } from '../core/types.js'
import { PARENT_KIND, formatRef } from '../core/types.js'
import { generateId, nowIso } from '../utils/helpers.js'
import { createLogger } from '../utils/logger.js'
import { deleteDraftsForTargets } from './queries/drafts.js'
import type { ContentEntity, EntityVersion } from './queries/entities.js'
import {
  getEntityRow,
  getMaxPosition,
  insertEntity,
  listAllLiveChildren,
  listEntityVersions,
  listLiveByKind,
  listLiveChildren,
  markEntityDeleted,
  setEntityPosition,
  updateEntityFields,
} from './queries/entities.js'

const logger = createLogger('persistence:entity-store')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CreateEntityInput {
  kind: EntityKind
  /** Parent reference; must be null for projects only */
  parent: EntityRef | null
  fields: Record<string, unknown>
  /** Explicit id; generated from the kind when omitted */
  id?: string
}

export interface DeleteResult {
  deleted: EntityRef[]
  draftsRemoved: number
}

export interface EntityStore {
  /** Live entity, or undefined when missing or deleted */
  get(ref: EntityRef): ContentEntity | undefined
  /** Live entity; throws NotFoundError otherwise */
  require(ref: EntityRef): ContentEntity
  /** Live entities of one kind */
  list(kind: EntityKind): ContentEntity[]
  /** Append a new entity at the end of its parent's children of the same kind */
  create(input: CreateEntityInput): ContentEntity
  /** Replace an entity's fields, keeping the previous fields as a version */
  updateFields(ref: EntityRef, fields: Record<string, unknown>): ContentEntity
  /** Live children of one kind, ordered by position */
  children(parent: EntityRef, kind: EntityKind): ContentEntity[]
  /** Ancestor chain from the immediate parent up to the project root */
  ancestors(ref: EntityRef): ContentEntity[]
  versions(ref: EntityRef): EntityVersion[]
  /** Soft-delete an entity and its descendants, and delete their drafts */
  delete(ref: EntityRef): DeleteResult
  /** Run `fn` inside one SQLite transaction (nested calls use savepoints) */
  transaction<T>(fn: () => T): T
}

// ---------------------------------------------------------------------------
// SqliteEntityStore
// ---------------------------------------------------------------------------

export class SqliteEntityStore implements EntityStore {
  private readonly _db: BetterSqlite3Database

  constructor(db: BetterSqlite3Database) {
    this._db = db
  }

  get(ref: EntityRef): ContentEntity | undefined {
    const entity = getEntityRow(this._db, ref.kind, ref.id)
    if (entity === undefined || entity.deleted_at !== null) return undefined
    return entity
  }

  require(ref: EntityRef): ContentEntity {
    const entity = this.get(ref)
    if (entity === undefined) {
      throw new NotFoundError(ref.kind, ref.id)
    }
    return entity
  }

  list(kind: EntityKind): ContentEntity[] {
    return listLiveByKind(this._db, kind)
  }

  create(input: CreateEntityInput): ContentEntity {
    const expectedParent = PARENT_KIND[input.kind]
    const id = input.id ?? generateId(input.kind)

    if (expectedParent === null) {
      if (input.parent !== null) {
        throw new ScopeError(`A ${input.kind} cannot have a parent`, {
          kind: input.kind,
          parent: formatRef(input.parent),
        })
      }
      insertEntity(this._db, {
        kind: input.kind,
        id,
        parent_kind: null,
        parent_id: null,
        position: 1,
        fields: input.fields,
        created_at: nowIso(),
      })
      return this.require({ kind: input.kind, id })
    }

    const parentRef = input.parent
    if (parentRef === null || parentRef.kind !== expectedParent) {
      throw new ScopeError(`A ${input.kind} must be attached to a ${expectedParent}`, {
        kind: input.kind,
        parent: parentRef === null ? null : formatRef(parentRef),
      })
    }
    if (this.get(parentRef) === undefined) {
      throw new ScopeError(`Parent ${formatRef(parentRef)} does not exist`, {
        kind: input.kind,
        parent: formatRef(parentRef),
      })
    }

    const position = getMaxPosition(this._db, parentRef.id, input.kind) + 1
    insertEntity(this._db, {
      kind: input.kind,
      id,
      parent_kind: parentRef.kind,
      parent_id: parentRef.id,
      position,
      fields: input.fields,
      created_at: nowIso(),
    })
    logger.debug({ ref: `${input.kind}:${id}`, parent: formatRef(parentRef), position }, 'Entity created')
    return this.require({ kind: input.kind, id })
  }

  updateFields(ref: EntityRef, fields: Record<string, unknown>): ContentEntity {
    this.require(ref)
    updateEntityFields(this._db, ref.kind, ref.id, fields, nowIso())
    return this.require(ref)
  }

  children(parent: EntityRef, kind: EntityKind): ContentEntity[] {
    if (PARENT_KIND[kind] !== parent.kind) return []
    return listLiveChildren(this._db, parent.id, kind)
  }

  ancestors(ref: EntityRef): ContentEntity[] {
    const start = this.get(ref)
    if (start === undefined) {
      throw new ScopeError(`Entity ${formatRef(ref)} does not exist`, { ref: formatRef(ref) })
    }

    const chain: ContentEntity[] = []
    const seen = new Set<string>([formatRef(ref)])
    let current = start

    for (;;) {
      const expected = PARENT_KIND[current.kind]
      if (expected === null) return chain

      if (current.parent_id === null || current.parent_kind !== expected) {
        throw new ScopeError(`Entity ${formatRef(current)} has no ${expected} parent`, {
          ref: formatRef(ref),
          broken: formatRef(current),
        })
      }
      const parentRef: EntityRef = { kind: expected, id: current.parent_id }
      const key = formatRef(parentRef)
      if (seen.has(key)) {
        throw new ScopeError(`Ancestor chain of ${formatRef(ref)} contains a cycle`, {
          ref: formatRef(ref),
          at: key,
        })
      }
      seen.add(key)

      const parent = this.get(parentRef)
      if (parent === undefined) {
        throw new ScopeError(`Entity ${formatRef(current)} is orphaned: ${key} is missing`, {
          ref: formatRef(ref),
          missing: key,
        })
      }
      chain.push(parent)
      current = parent
    }
  }

  versions(ref: EntityRef): EntityVersion[] {
    return listEntityVersions(this._db, ref.kind, ref.id)
  }

  delete(ref: EntityRef): DeleteResult {
    return this.transaction(() => {
      const root = this.require(ref)
      const now = nowIso()

      const lineage: ContentEntity[] = [root]
      for (let i = 0; i < lineage.length; i++) {
        const entity = lineage[i]
        if (entity === undefined) break
        lineage.push(...listAllLiveChildren(this._db, entity.id))
      }

      for (const entity of lineage) {
        markEntityDeleted(this._db, entity.kind, entity.id, now)
      }
      const draftsRemoved = deleteDraftsForTargets(
        this._db,
        lineage.map((e) => e.id),
      )

      // Close the gap left among the deleted entity's siblings
      if (root.parent_id !== null) {
        const siblings = listLiveChildren(this._db, root.parent_id, root.kind)
        siblings.forEach((sibling, index) => {
          if (sibling.position !== index + 1) {
            setEntityPosition(this._db, sibling.kind, sibling.id, index + 1)
          }
        })
      }

      logger.info({ ref: formatRef(ref), entities: lineage.length, draftsRemoved }, 'Entity lineage deleted')
      return {
        deleted: lineage.map((e) => ({ kind: e.kind, id: e.id })),
        draftsRemoved,
      }
    })
  }

  transaction<T>(fn: () => T): T {
    return this._db.transaction(fn)()
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createEntityStore(db: BetterSqlite3Database): EntityStore {
  return new SqliteEntityStore(db)
}
