/**
 * Migration 001: content hierarchy schema.
 *
 * Creates:
 *  - content_entities (flat collection keyed by (kind, id); hierarchy via parent columns)
 *  - entity_versions  (field snapshots of superseded entity versions)
 *  - instructions     (creative instructions attached to one scope entity)
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const contentSchemaMigration: Migration = {
  version: 1,
  name: '001-content-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS content_entities (
        kind        TEXT    NOT NULL,
        id          TEXT    NOT NULL,
        parent_kind TEXT,
        parent_id   TEXT,
        position    INTEGER NOT NULL DEFAULT 0,
        fields      TEXT    NOT NULL DEFAULT '{}',
        version     INTEGER NOT NULL DEFAULT 1,
        deleted_at  TEXT,
        created_at  TEXT    NOT NULL,
        updated_at  TEXT    NOT NULL,
        PRIMARY KEY (kind, id),
        CHECK (kind IN ('project', 'chapter', 'scene', 'panel', 'character', 'location')),
        CHECK ((kind = 'project') = (parent_id IS NULL))
      );
      CREATE INDEX IF NOT EXISTS idx_entities_parent ON content_entities(parent_id, kind);
      CREATE UNIQUE INDEX IF NOT EXISTS uq_entities_live_position
        ON content_entities(parent_id, kind, position)
        WHERE deleted_at IS NULL AND parent_id IS NOT NULL;

      CREATE TABLE IF NOT EXISTS entity_versions (
        kind       TEXT    NOT NULL,
        id         TEXT    NOT NULL,
        version    INTEGER NOT NULL,
        fields     TEXT    NOT NULL,
        created_at TEXT    NOT NULL,
        PRIMARY KEY (kind, id, version),
        FOREIGN KEY (kind, id) REFERENCES content_entities(kind, id)
      );

      CREATE TABLE IF NOT EXISTS instructions (
        id           TEXT    PRIMARY KEY,
        scope_kind   TEXT    NOT NULL,
        scope_id     TEXT    NOT NULL,
        content_kind TEXT    NOT NULL,
        text         TEXT    NOT NULL,
        priority     INTEGER NOT NULL DEFAULT 500,
        active       INTEGER NOT NULL DEFAULT 1,
        directive    TEXT,
        created_at   TEXT    NOT NULL,
        CHECK (scope_kind IN ('project', 'chapter', 'scene', 'panel')),
        CHECK (priority BETWEEN 0 AND 1000),
        CHECK (directive IS NULL OR directive IN ('direct', 'review'))
      );
      CREATE INDEX IF NOT EXISTS idx_instructions_scope ON instructions(scope_kind, scope_id);
    `)
  },
}
