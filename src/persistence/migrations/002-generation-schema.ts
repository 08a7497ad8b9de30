/**
 * Migration 002: generation and draft tracking.
 *
 * Creates:
 *  - generations (one row per attempt-chain)
 *  - drafts      (reviewable variants; at most one pending per target + content kind)
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const generationSchemaMigration: Migration = {
  version: 2,
  name: '002-generation-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS generations (
        id            TEXT    PRIMARY KEY,
        task_kind     TEXT    NOT NULL,
        target_kind   TEXT    NOT NULL,
        target_id     TEXT    NOT NULL,
        provider      TEXT    NOT NULL,
        status        TEXT    NOT NULL DEFAULT 'queued',
        attempt_count INTEGER NOT NULL DEFAULT 0,
        error         TEXT,
        error_code    TEXT,
        started_at    TEXT,
        finished_at   TEXT,
        created_at    TEXT    NOT NULL,
        updated_at    TEXT    NOT NULL,
        CHECK (status IN ('queued', 'running', 'completed', 'failed', 'cancelled'))
      );
      CREATE INDEX IF NOT EXISTS idx_generations_target ON generations(target_id);
      CREATE INDEX IF NOT EXISTS idx_generations_status ON generations(status);

      CREATE TABLE IF NOT EXISTS drafts (
        id                    TEXT    PRIMARY KEY,
        target_kind           TEXT    NOT NULL,
        target_id             TEXT    NOT NULL,
        content_kind          TEXT    NOT NULL,
        variants              TEXT    NOT NULL,
        status                TEXT    NOT NULL DEFAULT 'pending',
        feedback              TEXT,
        created_from_draft_id TEXT    REFERENCES drafts(id) ON DELETE SET NULL,
        generation_id         TEXT    REFERENCES generations(id) ON DELETE SET NULL,
        selected_variant      INTEGER,
        system_error          TEXT,
        created_at            TEXT    NOT NULL,
        updated_at            TEXT    NOT NULL,
        CHECK (status IN ('pending', 'selected', 'rejected', 'revised', 'applied', 'superseded'))
      );
      CREATE INDEX IF NOT EXISTS idx_drafts_target ON drafts(target_id, content_kind);
      CREATE UNIQUE INDEX IF NOT EXISTS uq_drafts_single_pending
        ON drafts(target_id, content_kind)
        WHERE status = 'pending';
    `)
  },
}
