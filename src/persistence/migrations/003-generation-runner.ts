/**
 * Migration 003: generation ownership.
 *
 * Adds the host and process id of the engine that queued each generation,
 * so start-up recovery only touches generations whose owner has exited.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const generationRunnerMigration: Migration = {
  version: 3,
  name: '003-generation-runner',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      ALTER TABLE generations ADD COLUMN runner_host TEXT;
      ALTER TABLE generations ADD COLUMN runner_pid  INTEGER;
    `)
  },
}
