/**
 * Versioned schema migrations for the engine store, tracked in
 * `schema_migrations`.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { ConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { contentSchemaMigration } from './001-content-schema.js'
import { generationSchemaMigration } from './002-generation-schema.js'
import { generationRunnerMigration } from './003-generation-runner.js'

const logger = createLogger('persistence:migrations')

export interface Migration {
  version: number
  name: string
  /** Applied inside a transaction together with its schema_migrations row */
  up(db: BetterSqlite3Database): void
}

export interface MigrationReport {
  /** Names of the migrations this run applied, in order */
  applied: string[]
  /** Schema version after the run */
  version: number
}

/** In version order */
export const MIGRATIONS: readonly Migration[] = [
  contentSchemaMigration,
  generationSchemaMigration,
  generationRunnerMigration,
]

export const LATEST_SCHEMA_VERSION = MIGRATIONS.reduce((max, m) => Math.max(max, m.version), 0)

/**
 * Bring the schema up to LATEST_SCHEMA_VERSION. Re-running is a no-op.
 *
 * @throws {ConfigError} if the database was written by a newer schema than this build knows
 */
export function runMigrations(db: BetterSqlite3Database): MigrationReport {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT    NOT NULL,
      applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const recorded = new Set(
    db
      .prepare<[], { version: number }>('SELECT version FROM schema_migrations')
      .all()
      .map((row) => row.version),
  )
  const newest = Math.max(0, ...recorded)
  if (newest > LATEST_SCHEMA_VERSION) {
    throw new ConfigError(
      `Database schema version ${String(newest)} is newer than this build supports (${String(LATEST_SCHEMA_VERSION)})`,
      { found: newest, supported: LATEST_SCHEMA_VERSION },
    )
  }

  const record = db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
  const applied: string[] = []
  for (const migration of MIGRATIONS) {
    if (recorded.has(migration.version)) continue
    db.transaction(() => {
      migration.up(db)
      record.run(migration.version, migration.name)
    })()
    applied.push(migration.name)
    logger.info({ version: migration.version, name: migration.name }, 'Migration applied')
  }

  if (applied.length === 0) {
    logger.debug({ version: newest }, 'Schema up to date')
  }
  return { applied, version: LATEST_SCHEMA_VERSION }
}
