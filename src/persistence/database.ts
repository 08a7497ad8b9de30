/**
 * SQLite connection for the engine store.
 *
 * File databases run in WAL mode so CLI reads do not wait on a generation
 * that is writing; `:memory:` databases keep SQLite's default journal.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/di.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

export const MEMORY_DATABASE = ':memory:'

const CONNECTION_PRAGMAS = ['busy_timeout = 5000', 'synchronous = NORMAL', 'foreign_keys = ON'] as const

/**
 * Open a connection with the engine's pragmas applied, creating the parent
 * directory of a file database if needed. Does not migrate.
 */
export function openConnection(path: string): BetterSqlite3Database {
  const inMemory = path === MEMORY_DATABASE
  if (!inMemory) mkdirSync(dirname(path), { recursive: true })

  const db = new BetterSqlite3(path)
  if (!inMemory) db.pragma('journal_mode = WAL')
  for (const pragma of CONNECTION_PRAGMAS) {
    db.pragma(pragma)
  }
  return db
}

export interface DatabaseService extends BaseService {
  readonly isOpen: boolean
  /** Raw handle for the query modules */
  readonly db: BetterSqlite3Database
  /** Schema version after initialize(); 0 before */
  readonly schemaVersion: number
}

/**
 * Opens and migrates on initialize(). A connection whose migration fails is
 * closed again before the error propagates.
 */
export class SqliteDatabaseService implements DatabaseService {
  private readonly _path: string
  private _db: BetterSqlite3Database | null = null
  private _schemaVersion = 0

  constructor(path: string) {
    this._path = path
  }

  get isOpen(): boolean {
    return this._db !== null
  }

  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error(`Engine store ${this._path} is not open; call initialize() first`)
    }
    return this._db
  }

  get schemaVersion(): number {
    return this._schemaVersion
  }

  async initialize(): Promise<void> {
    if (this._db !== null) return

    const db = openConnection(this._path)
    try {
      const report = runMigrations(db)
      this._schemaVersion = report.version
    } catch (err) {
      db.close()
      throw err
    }
    this._db = db
    logger.debug({ path: this._path, schemaVersion: this._schemaVersion }, 'Engine store open')
  }

  async shutdown(): Promise<void> {
    if (this._db === null) return
    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'Engine store closed')
  }
}

export function createDatabaseService(path: string): DatabaseService {
  return new SqliteDatabaseService(path)
}
