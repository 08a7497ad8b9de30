/**
 * Tests for generation recovery at start-up: only generations whose owning
 * engine process is gone are failed.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  createGeneration,
  failOrphanedGenerations,
  finishGeneration,
  getGeneration,
} from '../../src/persistence/queries/generations.js'
import type { RunnerIdentity } from '../../src/persistence/queries/generations.js'
import { openMemoryDb } from '../fixtures/story.js'

const CREATED = '2026-01-01T00:00:00.000Z'
const NOW = '2026-01-02T00:00:00.000Z'

const runner: RunnerIdentity = { host: 'studio-1', pid: 100, isAlive: (pid) => pid === 200 }

function queue(db: BetterSqlite3Database, id: string, host: string, pid: number): void {
  createGeneration(db, {
    id,
    task_kind: 'scene_summary',
    target_kind: 'scene',
    target_id: 'scene-1',
    provider: 'scripted',
    created_at: CREATED,
    runner_host: host,
    runner_pid: pid,
  })
}

describe('failOrphanedGenerations', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
  })

  afterEach(() => {
    db.close()
  })

  it('fails only generations whose owner has exited on this host', () => {
    queue(db, 'gen-own', 'studio-1', 100)
    queue(db, 'gen-live', 'studio-1', 200)
    queue(db, 'gen-dead', 'studio-1', 300)
    queue(db, 'gen-remote', 'studio-2', 300)

    expect(failOrphanedGenerations(db, runner, NOW)).toEqual(['gen-dead'])

    expect(getGeneration(db, 'gen-dead')).toMatchObject({
      status: 'failed',
      error: 'interrupted before completion',
      error_code: 'INTERRUPTED',
      finished_at: NOW,
    })
    for (const id of ['gen-own', 'gen-live', 'gen-remote']) {
      expect(getGeneration(db, id)?.status).toBe('queued')
    }
  })

  it('treats rows without a recorded owner as orphaned', () => {
    queue(db, 'gen-legacy', 'studio-1', 300)
    db.prepare('UPDATE generations SET runner_host = NULL, runner_pid = NULL WHERE id = ?').run('gen-legacy')

    expect(failOrphanedGenerations(db, runner, NOW)).toEqual(['gen-legacy'])
  })

  it('leaves finished generations alone', () => {
    queue(db, 'gen-done', 'studio-1', 300)
    finishGeneration(db, 'gen-done', { status: 'completed', finished_at: CREATED })

    expect(failOrphanedGenerations(db, runner, NOW)).toEqual([])
    expect(getGeneration(db, 'gen-done')).toMatchObject({ status: 'completed', error: null })
  })
})
