/**
 * Draft query functions for the SQLite persistence layer.
 *
 * Variants are stored as a JSON array. The partial unique index
 * uq_drafts_single_pending rejects a second pending draft per
 * (target, content kind).
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { ContentKind, DraftStatus, EntityKind } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface DraftRow {
  id: string
  target_kind: EntityKind
  target_id: string
  content_kind: ContentKind
  variants: string
  status: DraftStatus
  feedback: string | null
  created_from_draft_id: string | null
  generation_id: string | null
  selected_variant: number | null
  system_error: string | null
  created_at: string
  updated_at: string
}

export interface Draft extends Omit<DraftRow, 'variants'> {
  variants: unknown[]
}

export interface InsertDraftInput {
  id: string
  target_kind: EntityKind
  target_id: string
  content_kind: ContentKind
  variants: unknown[]
  feedback: string | null
  created_from_draft_id: string | null
  generation_id: string | null
  created_at: string
}

export interface UpdateDraftStatusInput {
  status: DraftStatus
  selected_variant?: number | null
  system_error?: string | null
  feedback?: string | null
  updated_at: string
}

// ---------------------------------------------------------------------------
// Row decoding
// ---------------------------------------------------------------------------

function toDraft(row: DraftRow): Draft {
  const parsed: unknown = JSON.parse(row.variants)
  return { ...row, variants: Array.isArray(parsed) ? parsed : [] }
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

export function insertDraft(db: BetterSqlite3Database, input: InsertDraftInput): void {
  db.prepare(`
    INSERT INTO drafts (
      id, target_kind, target_id, content_kind, variants, status, feedback,
      created_from_draft_id, generation_id, created_at, updated_at
    ) VALUES (
      @id, @target_kind, @target_id, @content_kind, @variants, 'pending', @feedback,
      @created_from_draft_id, @generation_id, @created_at, @created_at
    )
  `).run({ ...input, variants: JSON.stringify(input.variants) })
}

export function getDraft(db: BetterSqlite3Database, id: string): Draft | undefined {
  const row = db.prepare('SELECT * FROM drafts WHERE id = ?').get(id) as DraftRow | undefined
  return row === undefined ? undefined : toDraft(row)
}

export function getPendingDraft(
  db: BetterSqlite3Database,
  targetId: string,
  contentKind: ContentKind,
): Draft | undefined {
  const row = db
    .prepare(
      `SELECT * FROM drafts WHERE target_id = ? AND content_kind = ? AND status = 'pending'`,
    )
    .get(targetId, contentKind) as DraftRow | undefined
  return row === undefined ? undefined : toDraft(row)
}

export function getDraftByGeneration(
  db: BetterSqlite3Database,
  generationId: string,
): Draft | undefined {
  const row = db
    .prepare('SELECT * FROM drafts WHERE generation_id = ?')
    .get(generationId) as DraftRow | undefined
  return row === undefined ? undefined : toDraft(row)
}

/**
 * Drafts for a target, oldest first, optionally limited to one content kind
 * and one status.
 */
export function listDraftsForTarget(
  db: BetterSqlite3Database,
  targetId: string,
  filter: { contentKind?: ContentKind; status?: DraftStatus } = {},
): Draft[] {
  const clauses = ['target_id = @target_id']
  const params: Record<string, string> = { target_id: targetId }
  if (filter.contentKind !== undefined) {
    clauses.push('content_kind = @content_kind')
    params.content_kind = filter.contentKind
  }
  if (filter.status !== undefined) {
    clauses.push('status = @status')
    params.status = filter.status
  }
  const rows = db
    .prepare(`SELECT * FROM drafts WHERE ${clauses.join(' AND ')} ORDER BY created_at ASC, rowid ASC`)
    .all(params) as DraftRow[]
  return rows.map(toDraft)
}

export function updateDraftStatus(
  db: BetterSqlite3Database,
  id: string,
  input: UpdateDraftStatusInput,
): void {
  const setClauses = ['status = @status', 'updated_at = @updated_at']
  const params: Record<string, unknown> = {
    id,
    status: input.status,
    updated_at: input.updated_at,
  }
  if (input.selected_variant !== undefined) {
    setClauses.push('selected_variant = @selected_variant')
    params.selected_variant = input.selected_variant
  }
  if (input.system_error !== undefined) {
    setClauses.push('system_error = @system_error')
    params.system_error = input.system_error
  }
  if (input.feedback !== undefined) {
    setClauses.push('feedback = @feedback')
    params.feedback = input.feedback
  }

  const result = db
    .prepare(`UPDATE drafts SET ${setClauses.join(', ')} WHERE id = @id`)
    .run(params)
  if (result.changes === 0) {
    throw new Error(`Draft "${id}" not found`)
  }
}

/**
 * Delete every draft whose target is one of `targetIds`.
 * @returns number of drafts removed
 */
export function deleteDraftsForTargets(db: BetterSqlite3Database, targetIds: string[]): number {
  if (targetIds.length === 0) return 0
  const placeholders = targetIds.map(() => '?').join(', ')
  const result = db
    .prepare(`DELETE FROM drafts WHERE target_id IN (${placeholders})`)
    .run(...targetIds)
  return result.changes
}
