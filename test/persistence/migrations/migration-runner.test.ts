/**
 * Tests for the migration runner.
 *
 * Validates:
 *  - Every registered migration is recorded in schema_migrations
 *  - The content and generation tables exist after one run
 *  - A second run applies nothing
 *  - A database from a newer schema is refused
 *  - A version 2 database gains the generation owner columns
 *  - The partial unique index allows only one pending draft per target and kind
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { ConfigError } from '../../../src/core/errors.js'
import { MIGRATIONS, runMigrations } from '../../../src/persistence/migrations/index.js'

function openMemoryDb(): BetterSqlite3Database {
  const db = new BetterSqlite3(':memory:')
  db.pragma('foreign_keys = ON')
  return db
}

function insertDraft(db: BetterSqlite3Database, id: string, status: string): void {
  db.prepare(
    `INSERT INTO drafts (id, target_kind, target_id, content_kind, variants, status, created_at, updated_at)
     VALUES (?, 'scene', 'scene-1', 'scene_summary', '[]', ?, '2026-01-01', '2026-01-01')`,
  ).run(id, status)
}

describe('runMigrations', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
  })

  afterEach(() => {
    db.close()
  })

  it('records every migration in order', () => {
    runMigrations(db)

    const rows = db
      .prepare<[], { version: number; name: string }>('SELECT version, name FROM schema_migrations ORDER BY version')
      .all()
    expect(rows).toEqual([
      { version: 1, name: '001-content-schema' },
      { version: 2, name: '002-generation-schema' },
      { version: 3, name: '003-generation-runner' },
    ])
  })

  it('creates the content and generation tables', () => {
    runMigrations(db)

    const tables = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name != 'schema_migrations' ORDER BY name",
      )
      .all()
      .map((row) => row.name)
    expect(tables).toEqual(['content_entities', 'drafts', 'entity_versions', 'generations', 'instructions'])
  })

  it('reports what it applied', () => {
    expect(runMigrations(db)).toEqual({
      applied: ['001-content-schema', '002-generation-schema', '003-generation-runner'],
      version: 3,
    })
    expect(runMigrations(db)).toEqual({ applied: [], version: 3 })
  })

  it('is idempotent', () => {
    runMigrations(db)
    expect(() => {
      runMigrations(db)
    }).not.toThrow()

    const count = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM schema_migrations').get()
    expect(count?.n).toBe(3)
  })

  it('allows one pending draft per target and content kind', () => {
    runMigrations(db)
    insertDraft(db, 'draft-1', 'pending')
    insertDraft(db, 'draft-2', 'rejected')

    expect(() => {
      insertDraft(db, 'draft-3', 'pending')
    }).toThrow(/UNIQUE constraint failed/)
  })

  it('rejects an unknown draft status', () => {
    runMigrations(db)

    expect(() => {
      insertDraft(db, 'draft-1', 'archived')
    }).toThrow(/CHECK constraint failed/)
  })

  it('refuses a database written by a newer schema', () => {
    runMigrations(db)
    db.prepare("INSERT INTO schema_migrations (version, name) VALUES (9, '009-future')").run()

    expect(() => runMigrations(db)).toThrow(new ConfigError('Database schema version 9 is newer than this build supports (3)'))
  })

  it('adds the owner columns to a version 2 database', () => {
    db.exec(`
      CREATE TABLE schema_migrations (
        version    INTEGER PRIMARY KEY,
        name       TEXT    NOT NULL,
        applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
      )
    `)
    for (const migration of MIGRATIONS.slice(0, 2)) {
      migration.up(db)
      db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)').run(migration.version, migration.name)
    }

    expect(runMigrations(db).applied).toEqual(['003-generation-runner'])
    const columns = db
      .prepare<[], { name: string }>('PRAGMA table_info(generations)')
      .all()
      .map((row) => row.name)
    expect(columns.slice(-2)).toEqual(['runner_host', 'runner_pid'])
  })
})
