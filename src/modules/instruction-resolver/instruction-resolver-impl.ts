/**
 * InstructionResolverImpl: combines instructions attached along a target's
 * ancestor chain into one ordered list.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { NotFoundError, RequestError, ScopeError } from '../../core/errors.js'
import type { ContentKind, EntityRef, ScopeKind } from '../../core/types.js'
import { formatRef, isScopeKind } from '../../core/types.js'
import type { EntityStore } from '../../persistence/entity-store.js'
import type { Instruction, ScopeKey, SequencedInstruction } from '../../persistence/queries/instructions.js'
import {
  createInstruction,
  deactivateInstruction,
  getInstruction,
  listActiveInstructions,
  listInstructionsForScope,
} from '../../persistence/queries/instructions.js'
import { generateId, nowIso } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { parseDirective } from './directive-parser.js'
import type { InstructionResolver } from './instruction-resolver.js'
import { AddInstructionInputSchema, SCOPE_RANK } from './types.js'
import type { AddInstructionInput, ResolvedInstruction } from './types.js'

const logger = createLogger('instruction-resolver')

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

/**
 * Comparator for effective instruction order. Scope rank always dominates
 * priority; priority only breaks ties within one scope level.
 */
export function compareInstructions(a: SequencedInstruction, b: SequencedInstruction): number {
  const byScope = SCOPE_RANK[a.scope_kind] - SCOPE_RANK[b.scope_kind]
  if (byScope !== 0) return byScope
  if (a.priority !== b.priority) return b.priority - a.priority
  if (a.created_at !== b.created_at) return a.created_at < b.created_at ? 1 : -1
  return b.seq - a.seq
}

// ---------------------------------------------------------------------------
// InstructionResolverImpl
// ---------------------------------------------------------------------------

export class InstructionResolverImpl implements InstructionResolver {
  private readonly _db: BetterSqlite3Database
  private readonly _store: EntityStore

  constructor(options: { db: BetterSqlite3Database; store: EntityStore }) {
    this._db = options.db
    this._store = options.store
  }

  resolve(target: EntityRef, contentKind: ContentKind): ResolvedInstruction[] {
    const ancestors = this._store.ancestors(target)

    const scopes: ScopeKey[] = []
    for (const ref of [target, ...ancestors]) {
      if (isScopeKind(ref.kind)) scopes.push({ kind: ref.kind, id: ref.id })
    }

    const rows = listActiveInstructions(this._db, scopes, contentKind).sort(compareInstructions)
    logger.debug(
      { target: formatRef(target), contentKind, scopes: scopes.length, instructions: rows.length },
      'Instructions resolved',
    )
    return rows.map((row) => ({
      id: row.id,
      text: row.text,
      scopeKind: row.scope_kind,
      scopeId: row.scope_id,
      priority: row.priority,
      directive: row.directive,
    }))
  }

  add(input: AddInstructionInput): Instruction {
    const parsed = AddInstructionInputSchema.safeParse(input)
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
      throw new RequestError(`Invalid instruction: ${issues.join('; ')}`, { issues })
    }
    const { scope, contentKind, text, priority, directive } = parsed.data

    if (this._store.get(scope) === undefined) {
      throw new ScopeError(`Instruction scope ${formatRef(scope)} does not exist`, {
        scope: formatRef(scope),
      })
    }

    const id = generateId('instr')
    createInstruction(this._db, {
      id,
      scope_kind: scope.kind,
      scope_id: scope.id,
      content_kind: contentKind,
      text,
      priority,
      directive: directive === undefined ? parseDirective(text) : directive,
      created_at: nowIso(),
    })

    const created = getInstruction(this._db, id)
    if (created === undefined) {
      throw new NotFoundError('instruction', id)
    }
    logger.info(
      { id, scope: formatRef(scope), contentKind, priority, directive: created.directive },
      'Instruction added',
    )
    return created
  }

  deactivate(id: string): void {
    if (!deactivateInstruction(this._db, id)) {
      throw new NotFoundError('instruction', id)
    }
    logger.info({ id }, 'Instruction deactivated')
  }

  list(scope: { kind: ScopeKind; id: string }): Instruction[] {
    return listInstructionsForScope(this._db, scope.kind, scope.id)
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createInstructionResolver(options: {
  db: BetterSqlite3Database
  store: EntityStore
}): InstructionResolver {
  return new InstructionResolverImpl(options)
}
