/**
 * Instruction query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Directive, InstructionContentKind, ScopeKind } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Instruction {
  id: string
  scope_kind: ScopeKind
  scope_id: string
  content_kind: InstructionContentKind
  text: string
  priority: number
  active: number
  directive: Directive | null
  created_at: string
}

/** Instruction row plus its insertion sequence, used as the final tiebreak */
export interface SequencedInstruction extends Instruction {
  seq: number
}

export interface CreateInstructionInput {
  id: string
  scope_kind: ScopeKind
  scope_id: string
  content_kind: InstructionContentKind
  text: string
  priority: number
  directive: Directive | null
  created_at: string
}

export interface ScopeKey {
  kind: ScopeKind
  id: string
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

export function createInstruction(db: BetterSqlite3Database, input: CreateInstructionInput): void {
  db.prepare(`
    INSERT INTO instructions (
      id, scope_kind, scope_id, content_kind, text, priority, active, directive, created_at
    ) VALUES (
      @id, @scope_kind, @scope_id, @content_kind, @text, @priority, 1, @directive, @created_at
    )
  `).run(input)
}

export function getInstruction(db: BetterSqlite3Database, id: string): Instruction | undefined {
  return db.prepare('SELECT * FROM instructions WHERE id = ?').get(id) as Instruction | undefined
}

/**
 * Instructions attached to one scope entity, active or not, newest first.
 */
export function listInstructionsForScope(
  db: BetterSqlite3Database,
  scopeKind: ScopeKind,
  scopeId: string,
): Instruction[] {
  return db
    .prepare(
      `SELECT * FROM instructions WHERE scope_kind = ? AND scope_id = ?
       ORDER BY created_at DESC, rowid DESC`,
    )
    .all(scopeKind, scopeId) as Instruction[]
}

/**
 * Active instructions attached to any of the given scopes that apply to
 * `contentKind` (directly or via "all"). Ordering is left to the caller.
 */
export function listActiveInstructions(
  db: BetterSqlite3Database,
  scopes: ScopeKey[],
  contentKind: InstructionContentKind,
): SequencedInstruction[] {
  if (scopes.length === 0) return []

  const scopeClauses = scopes.map((_, i) => `(scope_kind = @k${String(i)} AND scope_id = @i${String(i)})`)
  const params: Record<string, string> = { content_kind: contentKind }
  scopes.forEach((scope, i) => {
    params[`k${String(i)}`] = scope.kind
    params[`i${String(i)}`] = scope.id
  })

  return db
    .prepare(
      `SELECT rowid AS seq, * FROM instructions
       WHERE active = 1
         AND content_kind IN (@content_kind, 'all')
         AND (${scopeClauses.join(' OR ')})`,
    )
    .all(params) as SequencedInstruction[]
}

/**
 * Mark an instruction inactive. Returns false when no such instruction exists.
 */
export function deactivateInstruction(db: BetterSqlite3Database, id: string): boolean {
  const result = db.prepare('UPDATE instructions SET active = 0 WHERE id = ?').run(id)
  return result.changes > 0
}
