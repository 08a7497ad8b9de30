/**
 * Draft applier: writes a selected variant into the content hierarchy.
 *
 * Single-payload tasks merge the payload into the target's fields (a new
 * entity version). List tasks append one child per item after the existing
 * children. Everything happens in one store transaction: if any item fails
 * its post-hoc checks or its write, nothing is committed.
 */

import { ValidationError } from '../../core/errors.js'
import type { EntityRef } from '../../core/types.js'
import { formatRef } from '../../core/types.js'
import type { EntityStore } from '../../persistence/entity-store.js'
import type { ContentEntity } from '../../persistence/queries/entities.js'
import { createLogger } from '../../utils/logger.js'
import { normalizeCharacterName } from '../task-registry/cross-references.js'
import { listItems } from '../task-registry/task-definitions.js'
import type { TaskDefinition } from '../task-registry/types.js'
import type { ApplyRequest, ApplyResult } from './types.js'

const logger = createLogger('draft-applier')

// ---------------------------------------------------------------------------
// Post-hoc checks
// ---------------------------------------------------------------------------

function projectOf(store: EntityStore, target: EntityRef): EntityRef | null {
  if (target.kind === 'project') return target
  const root = store.ancestors(target).at(-1)
  return root === undefined ? null : { kind: 'project', id: root.id }
}

function rosterNames(store: EntityStore, project: EntityRef | null, excludeId?: string): string[] {
  if (project === null) return []
  const names: string[] = []
  for (const character of store.children(project, 'character')) {
    const name = character.fields['name']
    if (character.id !== excludeId && typeof name === 'string') names.push(name)
  }
  return names
}

/** Names in `candidates` that clash with `existing` (case-insensitive) */
function clashingNames(candidates: readonly string[], existing: readonly string[]): string[] {
  const taken = new Set(existing.map(normalizeCharacterName))
  return candidates.filter((name) => taken.has(normalizeCharacterName(name)))
}

function stringField(value: Record<string, unknown>, key: string): string | null {
  const field = value[key]
  return typeof field === 'string' ? field : null
}

// ---------------------------------------------------------------------------
// applyVariant
// ---------------------------------------------------------------------------

/**
 * Write `request.payload` for `definition` into the store.
 *
 * @throws {ValidationError} if the payload no longer passes its checks against
 *   the current store (schema, roster references, name uniqueness)
 * @throws {ScopeError} | {NotFoundError} if the target or its hierarchy is gone
 */
export function applyVariant(store: EntityStore, definition: TaskDefinition, request: ApplyRequest): ApplyResult {
  const { target } = request

  return store.transaction(() => {
    const existing = store.get(target)
    const project = existing === undefined ? null : projectOf(store, target)
    const roster = rosterNames(store, project)

    const outcome = definition.validate(request.payload, { cardinality: null, rosterNames: roster })
    if (!outcome.ok) {
      throw new ValidationError(
        `${definition.label} for ${formatRef(target)} cannot be applied: ${outcome.issues.join('; ')}`,
        outcome.issues,
        { target: formatRef(target) },
      )
    }
    const value = outcome.value

    if (definition.list !== null) {
      if (existing === undefined) {
        // Lets the store raise its NotFoundError
        store.require(target)
      }
      const items = listItems(definition, value)
      if (definition.list.childKind === 'character') {
        const clashes = clashingNames(
          items.map((item) => stringField(item, 'name') ?? ''),
          roster,
        )
        if (clashes.length > 0) {
          const issues = clashes.map((name) => `character "${name}" already exists`)
          throw new ValidationError(
            `${definition.label} for ${formatRef(target)} cannot be applied: ${issues.join('; ')}`,
            issues,
            { target: formatRef(target) },
          )
        }
      }

      const childKind = definition.list.childKind
      const offset = store.children(target, childKind).length
      const created: ContentEntity[] = items.map((item, index) => {
        const fields: Record<string, unknown> = 'number' in item ? { ...item, number: offset + index + 1 } : { ...item }
        return store.create({ kind: childKind, parent: target, fields })
      })

      logger.info({ target: formatRef(target), taskKind: definition.kind, created: created.length }, 'List applied')
      return { target: store.require(target), created }
    }

    if (existing === undefined) {
      if (target.kind !== 'project') {
        store.require(target)
      }
      const createdProject = store.create({ kind: 'project', parent: null, id: target.id, fields: value })
      logger.info({ target: formatRef(target) }, 'Project created from draft')
      return { target: createdProject, created: [] }
    }

    if (target.kind === 'character') {
      const name = stringField(value, 'name')
      const clashes = name === null ? [] : clashingNames([name], rosterNames(store, project, target.id))
      if (clashes.length > 0) {
        const issue = `character "${clashes.join('')}" already exists`
        throw new ValidationError(`${definition.label} for ${formatRef(target)} cannot be applied: ${issue}`, [issue], {
          target: formatRef(target),
        })
      }
    }

    const updated = store.updateFields(target, { ...existing.fields, ...value })
    logger.info({ target: formatRef(target), taskKind: definition.kind, version: updated.version }, 'Variant applied')
    return { target: updated, created: [] }
  })
}
