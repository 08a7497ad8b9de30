/**
 * Content entity query functions for the SQLite persistence layer.
 *
 * All functions accept a raw BetterSqlite3 database instance and use
 * prepared statements. Entity `fields` are stored as a JSON object.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { EntityKind } from '../../core/types.js'
import { isPlainObject } from '../../utils/helpers.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Raw row as stored in content_entities */
interface EntityRow {
  kind: EntityKind
  id: string
  parent_kind: EntityKind | null
  parent_id: string | null
  position: number
  fields: string
  version: number
  deleted_at: string | null
  created_at: string
  updated_at: string
}

/** A content entity with its fields decoded */
export interface ContentEntity {
  kind: EntityKind
  id: string
  parent_kind: EntityKind | null
  parent_id: string | null
  position: number
  fields: Record<string, unknown>
  version: number
  deleted_at: string | null
  created_at: string
  updated_at: string
}

export interface InsertEntityInput {
  kind: EntityKind
  id: string
  parent_kind: EntityKind | null
  parent_id: string | null
  position: number
  fields: Record<string, unknown>
  created_at: string
}

/** Snapshot of an entity's fields before it was superseded by a newer version */
export interface EntityVersion {
  kind: EntityKind
  id: string
  version: number
  fields: Record<string, unknown>
  created_at: string
}

// ---------------------------------------------------------------------------
// Row decoding
// ---------------------------------------------------------------------------

export function parseJsonObject(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw)
  return isPlainObject(parsed) ? parsed : {}
}

function toEntity(row: EntityRow): ContentEntity {
  return { ...row, fields: parseJsonObject(row.fields) }
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

/**
 * Insert a new entity row.
 */
export function insertEntity(db: BetterSqlite3Database, input: InsertEntityInput): void {
  const stmt = db.prepare(`
    INSERT INTO content_entities (
      kind, id, parent_kind, parent_id, position, fields, version, created_at, updated_at
    ) VALUES (
      @kind, @id, @parent_kind, @parent_id, @position, @fields, 1, @created_at, @created_at
    )
  `)
  stmt.run({ ...input, fields: JSON.stringify(input.fields) })
}

/**
 * Retrieve an entity by kind and id, including soft-deleted rows.
 * Returns undefined if not found.
 */
export function getEntityRow(
  db: BetterSqlite3Database,
  kind: EntityKind,
  id: string,
): ContentEntity | undefined {
  const row = db
    .prepare('SELECT * FROM content_entities WHERE kind = ? AND id = ?')
    .get(kind, id) as EntityRow | undefined
  return row === undefined ? undefined : toEntity(row)
}

/**
 * Live children of one kind under a parent, ordered by position.
 */
export function listLiveChildren(
  db: BetterSqlite3Database,
  parentId: string,
  kind: EntityKind,
): ContentEntity[] {
  const rows = db
    .prepare(
      `SELECT * FROM content_entities
       WHERE parent_id = ? AND kind = ? AND deleted_at IS NULL
       ORDER BY position ASC`,
    )
    .all(parentId, kind) as EntityRow[]
  return rows.map(toEntity)
}

/**
 * Every live child of a parent regardless of kind.
 */
export function listAllLiveChildren(db: BetterSqlite3Database, parentId: string): ContentEntity[] {
  const rows = db
    .prepare(
      `SELECT * FROM content_entities
       WHERE parent_id = ? AND deleted_at IS NULL
       ORDER BY kind ASC, position ASC`,
    )
    .all(parentId) as EntityRow[]
  return rows.map(toEntity)
}

/**
 * Live entities of one kind, oldest first.
 */
export function listLiveByKind(db: BetterSqlite3Database, kind: EntityKind): ContentEntity[] {
  const rows = db
    .prepare(
      `SELECT * FROM content_entities WHERE kind = ? AND deleted_at IS NULL
       ORDER BY created_at ASC, rowid ASC`,
    )
    .all(kind) as EntityRow[]
  return rows.map(toEntity)
}

/**
 * Highest live position under a parent for one kind (0 when there are none).
 */
export function getMaxPosition(db: BetterSqlite3Database, parentId: string, kind: EntityKind): number {
  const row = db
    .prepare(
      `SELECT COALESCE(MAX(position), 0) AS max_position FROM content_entities
       WHERE parent_id = ? AND kind = ? AND deleted_at IS NULL`,
    )
    .get(parentId, kind) as { max_position: number }
  return row.max_position
}

/**
 * Replace an entity's fields, snapshotting the previous version first.
 * @returns the new version number
 */
export function updateEntityFields(
  db: BetterSqlite3Database,
  kind: EntityKind,
  id: string,
  fields: Record<string, unknown>,
  updatedAt: string,
): number {
  const current = db
    .prepare('SELECT version, fields FROM content_entities WHERE kind = ? AND id = ?')
    .get(kind, id) as { version: number; fields: string } | undefined
  if (current === undefined) {
    throw new Error(`Entity "${kind}:${id}" not found`)
  }

  db.prepare(
    `INSERT INTO entity_versions (kind, id, version, fields, created_at)
     VALUES (?, ?, ?, ?, ?)`,
  ).run(kind, id, current.version, current.fields, updatedAt)

  const nextVersion = current.version + 1
  db.prepare(
    `UPDATE content_entities SET fields = ?, version = ?, updated_at = ?
     WHERE kind = ? AND id = ?`,
  ).run(JSON.stringify(fields), nextVersion, updatedAt, kind, id)
  return nextVersion
}

/**
 * Previous versions of an entity, oldest first.
 */
export function listEntityVersions(
  db: BetterSqlite3Database,
  kind: EntityKind,
  id: string,
): EntityVersion[] {
  const rows = db
    .prepare('SELECT * FROM entity_versions WHERE kind = ? AND id = ? ORDER BY version ASC')
    .all(kind, id) as Array<Omit<EntityVersion, 'fields'> & { fields: string }>
  return rows.map((row) => ({ ...row, fields: parseJsonObject(row.fields) }))
}

/**
 * Soft-delete a single entity row.
 */
export function markEntityDeleted(
  db: BetterSqlite3Database,
  kind: EntityKind,
  id: string,
  deletedAt: string,
): void {
  db.prepare(
    'UPDATE content_entities SET deleted_at = ?, updated_at = ? WHERE kind = ? AND id = ?',
  ).run(deletedAt, deletedAt, kind, id)
}

/**
 * Move a live entity to a new position under its parent.
 */
export function setEntityPosition(
  db: BetterSqlite3Database,
  kind: EntityKind,
  id: string,
  position: number,
): void {
  db.prepare('UPDATE content_entities SET position = ? WHERE kind = ? AND id = ?').run(
    position,
    kind,
    id,
  )
}
