/**
 * Generation record query functions for the SQLite persistence layer.
 *
 * One row tracks a whole attempt-chain: status, how many attempts were
 * made, and the last error if the chain did not complete.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { EntityKind, GenerationStatus, TaskKind } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Generation {
  id: string
  task_kind: TaskKind
  target_kind: EntityKind
  target_id: string
  provider: string
  status: GenerationStatus
  attempt_count: number
  error: string | null
  error_code: string | null
  started_at: string | null
  finished_at: string | null
  created_at: string
  updated_at: string
  /** Host of the engine that queued the generation; null on rows from before ownership was recorded */
  runner_host: string | null
  runner_pid: number | null
}

export interface CreateGenerationInput {
  id: string
  task_kind: TaskKind
  target_kind: EntityKind
  target_id: string
  provider: string
  created_at: string
  runner_host: string
  runner_pid: number
}

/** The engine process asking for recovery */
export interface RunnerIdentity {
  host: string
  pid: number
  /** Liveness test for a process on `host` */
  isAlive: (pid: number) => boolean
}

export interface FinishGenerationInput {
  status: Extract<GenerationStatus, 'completed' | 'failed' | 'cancelled'>
  error?: string | null
  error_code?: string | null
  finished_at: string
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

export function createGeneration(db: BetterSqlite3Database, input: CreateGenerationInput): void {
  db.prepare(`
    INSERT INTO generations (
      id, task_kind, target_kind, target_id, provider, status, attempt_count,
      runner_host, runner_pid, created_at, updated_at
    ) VALUES (
      @id, @task_kind, @target_kind, @target_id, @provider, 'queued', 0,
      @runner_host, @runner_pid, @created_at, @created_at
    )
  `).run(input)
}

export function getGeneration(db: BetterSqlite3Database, id: string): Generation | undefined {
  return db.prepare('SELECT * FROM generations WHERE id = ?').get(id) as Generation | undefined
}

/**
 * Record the start of an attempt: status becomes running and attempt_count
 * is set to `attempt`.
 */
export function recordAttempt(
  db: BetterSqlite3Database,
  id: string,
  attempt: number,
  now: string,
): void {
  const result = db
    .prepare(
      `UPDATE generations
       SET status = 'running', attempt_count = ?, started_at = COALESCE(started_at, ?), updated_at = ?
       WHERE id = ?`,
    )
    .run(attempt, now, now, id)
  if (result.changes === 0) {
    throw new Error(`Generation "${id}" not found`)
  }
}

export function finishGeneration(
  db: BetterSqlite3Database,
  id: string,
  input: FinishGenerationInput,
): void {
  const result = db
    .prepare(
      `UPDATE generations
       SET status = @status, error = @error, error_code = @error_code,
           finished_at = @finished_at, updated_at = @finished_at
       WHERE id = @id`,
    )
    .run({
      id,
      status: input.status,
      error: input.error ?? null,
      error_code: input.error_code ?? null,
      finished_at: input.finished_at,
    })
  if (result.changes === 0) {
    throw new Error(`Generation "${id}" not found`)
  }
}

/**
 * Fail generations left queued or running by an engine process that no
 * longer exists. Rows owned by a live process, or by any process on another
 * host, are left alone. Rows with no recorded owner count as orphaned.
 *
 * @returns ids of the generations marked failed
 */
export function failOrphanedGenerations(
  db: BetterSqlite3Database,
  runner: RunnerIdentity,
  now: string,
): string[] {
  const unfinished = db
    .prepare<[], Pick<Generation, 'id' | 'runner_host' | 'runner_pid'>>(
      "SELECT id, runner_host, runner_pid FROM generations WHERE status IN ('queued', 'running')",
    )
    .all()

  const orphaned = unfinished.filter((row) => {
    if (row.runner_pid === null || row.runner_host === null) return true
    if (row.runner_host !== runner.host) return false
    return row.runner_pid !== runner.pid && !runner.isAlive(row.runner_pid)
  })

  const fail = db.prepare(
    `UPDATE generations
     SET status = 'failed', error = 'interrupted before completion', error_code = 'INTERRUPTED',
         finished_at = @now, updated_at = @now
     WHERE id = @id AND status IN ('queued', 'running')`,
  )
  db.transaction(() => {
    for (const row of orphaned) {
      fail.run({ id: row.id, now })
    }
  })()
  return orphaned.map((row) => row.id)
}
