/**
 * ContextAssemblerImpl: builds a GenerationContext from the entity store.
 *
 * Assembly steps:
 *  1. Load the target (absent only for a project summary that creates its project)
 *  2. Walk the ancestor chain to the project root
 *  3. Resolve instructions and check required cross-references
 *  4. Collect roster, existing children and siblings under the token budget
 *     (most recently updated first; the first item that does not fit ends a section)
 *  5. Freeze the result
 */

import { ContextError, ScopeError } from '../../core/errors.js'
import type { EntityKind, EntityRef } from '../../core/types.js'
import { formatRef } from '../../core/types.js'
import type { EntityStore } from '../../persistence/entity-store.js'
import type { ContentEntity } from '../../persistence/queries/entities.js'
import { deepClone, deepFreeze } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { CardinalityConfig } from '../config/config-schema.js'
import type { InstructionResolver } from '../instruction-resolver/instruction-resolver.js'
import { getTaskDefinition } from '../task-registry/task-definitions.js'
import { normalizeCharacterName } from '../task-registry/cross-references.js'
import type { ContextAssembler } from './context-assembler.js'
import { countValueTokens } from './token-counter.js'
import type { AssembleRequest, ContextEntity, GenerationContext } from './types.js'

const logger = createLogger('context-assembler')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ContextAssemblerOptions {
  store: EntityStore
  resolver: InstructionResolver
  /** Token budget for roster, existing children and siblings combined */
  tokenBudget: number
  cardinality: CardinalityConfig
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toContextEntity(entity: ContentEntity): ContextEntity {
  return {
    kind: entity.kind,
    id: entity.id,
    position: entity.position,
    version: entity.version,
    fields: deepClone(entity.fields),
  }
}

function byRecency(a: ContentEntity, b: ContentEntity): number {
  if (a.updated_at !== b.updated_at) return a.updated_at < b.updated_at ? 1 : -1
  if (a.position !== b.position) return b.position - a.position
  return a.id < b.id ? 1 : -1
}

interface Retained {
  kept: ContextEntity[]
  omitted: number
  remaining: number
}

/**
 * Keep the most recently updated items while they fit in `budget`.
 * The kept items are returned in position order.
 */
export function retainMostRecent(items: ContentEntity[], budget: number): Retained {
  const kept: ContentEntity[] = []
  let remaining = budget
  for (const item of [...items].sort(byRecency)) {
    const cost = countValueTokens(item.fields)
    if (cost > remaining) break
    kept.push(item)
    remaining -= cost
  }
  kept.sort((a, b) => a.position - b.position)
  return { kept: kept.map(toContextEntity), omitted: items.length - kept.length, remaining }
}

function characterNames(entities: ContentEntity[]): string[] {
  const names: string[] = []
  for (const entity of entities) {
    const name = entity.fields['name']
    if (typeof name === 'string' && name.trim() !== '') names.push(name)
  }
  return names
}

function referencedCharacters(entity: ContentEntity): string[] {
  const value = entity.fields['characters']
  if (!Array.isArray(value)) return []
  return value.filter((name): name is string => typeof name === 'string')
}

// ---------------------------------------------------------------------------
// ContextAssemblerImpl
// ---------------------------------------------------------------------------

export class ContextAssemblerImpl implements ContextAssembler {
  private readonly _store: EntityStore
  private readonly _resolver: InstructionResolver
  private readonly _tokenBudget: number
  private readonly _cardinality: CardinalityConfig

  constructor(options: ContextAssemblerOptions) {
    this._store = options.store
    this._resolver = options.resolver
    this._tokenBudget = options.tokenBudget
    this._cardinality = options.cardinality
  }

  assemble(request: AssembleRequest): GenerationContext {
    const { taskKind, target: targetRef } = request
    const definition = getTaskDefinition(taskKind)

    if (!definition.targetKinds.includes(targetRef.kind)) {
      throw new ContextError(`${definition.label} cannot target a ${targetRef.kind}`, {
        taskKind,
        target: formatRef(targetRef),
      })
    }

    const cardinality = definition.list === null ? null : { ...this._cardinality[definition.list.kind] }
    const userInput = request.userInput ?? null
    const feedback = request.feedback ?? null

    const target = this._store.get(targetRef)
    if (target === undefined) {
      if (taskKind !== 'project_summary') {
        throw new ContextError(`Target ${formatRef(targetRef)} does not exist`, {
          taskKind,
          target: formatRef(targetRef),
        })
      }
      return deepFreeze({
        taskKind,
        targetRef: { ...targetRef },
        target: null,
        parent: null,
        ancestors: [],
        siblings: [],
        existingChildren: [],
        roster: [],
        rosterNames: [],
        styleGuide: null,
        instructions: [],
        userInput,
        feedback: feedback === null ? null : deepClone(feedback),
        cardinality,
        truncated: false,
        omitted: { roster: 0, existingChildren: 0, siblings: 0 },
      })
    }

    const ancestors = this._ancestorsOf(targetRef)
    const parent = ancestors[0] ?? null
    const project = target.kind === 'project' ? target : ancestors[ancestors.length - 1]
    if (project === undefined || project.kind !== 'project') {
      throw new ContextError(`No project above ${formatRef(targetRef)}`, { target: formatRef(targetRef) })
    }
    const projectRef: EntityRef = { kind: 'project', id: project.id }

    const instructions = this._resolver.resolve(targetRef, taskKind)

    // Characters and cross-references
    const allCharacters = this._store.children(projectRef, 'character')
    const rosterNames = characterNames(allCharacters)
    if (definition.rosterRequired && rosterNames.length === 0) {
      throw new ContextError(`${definition.label} needs the project's characters, and it has none`, {
        taskKind,
        project: project.id,
      })
    }
    const known = new Set(rosterNames.map(normalizeCharacterName))
    const unknown = referencedCharacters(target).filter((name) => !known.has(normalizeCharacterName(name)))
    if (unknown.length > 0) {
      throw new ContextError(`${formatRef(targetRef)} references unknown characters: ${unknown.join(', ')}`, {
        target: formatRef(targetRef),
        unknown,
      })
    }

    // Trimmable sections
    const rosterCandidates =
      definition.includeRoster && target.kind !== 'character'
        ? allCharacters.filter((c) => c.id !== target.id)
        : []
    const childKind: EntityKind | null = definition.contextChildKind
    const childCandidates = childKind === null ? [] : this._store.children(targetRef, childKind)
    const siblingCandidates =
      parent === null
        ? []
        : this._store
            .children({ kind: parent.kind, id: parent.id }, target.kind)
            .filter((s) => s.id !== target.id)

    const roster = retainMostRecent(rosterCandidates, this._tokenBudget)
    const existingChildren = retainMostRecent(childCandidates, roster.remaining)
    const siblings = retainMostRecent(siblingCandidates, existingChildren.remaining)
    const omitted = {
      roster: roster.omitted,
      existingChildren: existingChildren.omitted,
      siblings: siblings.omitted,
    }
    const truncated = omitted.roster + omitted.existingChildren + omitted.siblings > 0
    if (truncated) {
      logger.debug({ target: formatRef(targetRef), taskKind, omitted }, 'Context trimmed to token budget')
    }

    const styleGuide = project.fields['style_guide']

    return deepFreeze({
      taskKind,
      targetRef: { kind: targetRef.kind, id: targetRef.id },
      target: toContextEntity(target),
      parent: parent === null ? null : toContextEntity(parent),
      ancestors: ancestors.map(toContextEntity),
      siblings: siblings.kept,
      existingChildren: existingChildren.kept,
      roster: roster.kept,
      rosterNames,
      styleGuide: typeof styleGuide === 'string' && styleGuide.trim() !== '' ? styleGuide : null,
      instructions,
      userInput,
      feedback: feedback === null ? null : deepClone(feedback),
      cardinality,
      truncated,
      omitted,
    })
  }

  private _ancestorsOf(ref: EntityRef): ContentEntity[] {
    try {
      return this._store.ancestors(ref)
    } catch (err) {
      if (err instanceof ScopeError) {
        throw new ContextError(`Broken hierarchy above ${formatRef(ref)}: ${err.message}`, {
          target: formatRef(ref),
          ...err.context,
        })
      }
      throw err
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createContextAssembler(options: ContextAssemblerOptions): ContextAssembler {
  return new ContextAssemblerImpl(options)
}
