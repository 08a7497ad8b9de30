/**
 * Unit tests for the built-in task definitions and list cross-reference checks.
 */

import { describe, it, expect } from 'vitest'
import { TASK_DEFINITIONS, getTaskDefinition, listItems } from '../task-definitions.js'
import { checkNumbering, checkRelationships } from '../cross-references.js'
import type { ValidationRules } from '../types.js'
import { CONTENT_KINDS } from '../../../core/types.js'

const NO_RULES: ValidationRules = { cardinality: null, rosterNames: [] }

function characters(count: number): Array<Record<string, unknown>> {
  return Array.from({ length: count }, (_, i) => ({
    name: `Person ${String(i + 1)}`,
    role: 'supporting',
    description: 'A face in the crowd.',
  }))
}

describe('TASK_DEFINITIONS', () => {
  it('has one definition per content kind, keyed by its own kind', () => {
    for (const kind of CONTENT_KINDS) {
      expect(getTaskDefinition(kind).kind).toBe(kind)
    }
  })

  it('marks the four list tasks with their child kinds', () => {
    const lists = CONTENT_KINDS.filter((kind) => TASK_DEFINITIONS[kind].list !== null).map((kind) => [
      kind,
      TASK_DEFINITIONS[kind].list?.childKind,
    ])
    expect(lists).toEqual([
      ['character_list', 'character'],
      ['chapter_list', 'chapter'],
      ['scene_list', 'scene'],
      ['panel_list', 'panel'],
    ])
  })
})

describe('project_summary validation', () => {
  const definition = TASK_DEFINITIONS.project_summary

  it('accepts a complete summary', () => {
    const outcome = definition.validate(
      { title: 'Orbit Noir', genre: 'sci-fi mystery', description: 'A detective on a space station.' },
      NO_RULES,
    )
    expect(outcome).toEqual({
      ok: true,
      value: { title: 'Orbit Noir', genre: 'sci-fi mystery', description: 'A detective on a space station.' },
    })
  })

  it('reports a missing required field by path', () => {
    const outcome = definition.validate({ title: 'Orbit Noir', description: 'x' }, NO_RULES)
    expect(outcome.ok).toBe(false)
    if (!outcome.ok) expect(outcome.issues).toEqual(['genre: Required'])
  })

  it('rejects a non-object payload', () => {
    expect(definition.validate('just text', NO_RULES).ok).toBe(false)
  })
})

describe('character_list validation', () => {
  const definition = TASK_DEFINITIONS.character_list
  const rules: ValidationRules = { cardinality: { min: 3, max: 8 }, rosterNames: [] }

  it('accepts a list inside the cardinality bounds', () => {
    expect(definition.validate({ characters: characters(3) }, rules).ok).toBe(true)
  })

  it('rejects a list below the minimum', () => {
    const outcome = definition.validate({ characters: characters(2) }, rules)
    expect(outcome).toEqual({ ok: false, issues: ['expected between 3 and 8 items, got 2'] })
  })

  it('rejects relationships naming a character outside the list', () => {
    const list = characters(3)
    list[0] = { ...list[0], relationships: { 'Person 2': 'sister', Ghost: 'rival' } }
    const outcome = definition.validate({ characters: list }, rules)
    expect(outcome).toEqual({
      ok: false,
      issues: ['"Person 1" has a relationship with unknown character "Ghost"'],
    })
  })

  it('rejects duplicate names regardless of case', () => {
    const list = characters(3)
    list[2] = { ...list[2], name: 'person 1' }
    const outcome = definition.validate({ characters: list }, rules)
    expect(outcome).toEqual({ ok: false, issues: ['duplicate character name "person 1"'] })
  })
})

describe('panel_list validation', () => {
  const definition = TASK_DEFINITIONS.panel_list
  const rules: ValidationRules = { cardinality: { min: 1, max: 4 }, rosterNames: ['Mira Voss'] }

  it('rejects panels that mention characters missing from the roster', () => {
    const outcome = definition.validate(
      {
        panels: [
          { number: 1, shot_type: 'wide_shot', description: 'The dock.', characters: ['Mira Voss'] },
          { number: 2, shot_type: 'close_up', description: 'A stranger.', characters: ['Nobody'] },
        ],
      },
      rules,
    )
    expect(outcome).toEqual({ ok: false, issues: ['panels[2] references unknown character "Nobody"'] })
  })

  it('rejects an unknown shot type', () => {
    const outcome = definition.validate(
      { panels: [{ number: 1, shot_type: 'dutch_angle', description: 'Tilted.' }] },
      rules,
    )
    expect(outcome.ok).toBe(false)
  })
})

describe('listItems', () => {
  it('returns the item array of a list payload', () => {
    const items = listItems(TASK_DEFINITIONS.chapter_list, {
      chapters: [{ number: 1, title: 'A', summary: 'B' }],
    })
    expect(items).toEqual([{ number: 1, title: 'A', summary: 'B' }])
  })

  it('returns an empty array for single-payload tasks', () => {
    expect(listItems(TASK_DEFINITIONS.scene_summary, { summary: 'x' })).toEqual([])
  })
})

describe('cross-reference checks', () => {
  it('checkNumbering reports items out of sequence', () => {
    expect(checkNumbering([{ number: 1 }, { number: 3 }])).toEqual(['item 2 is numbered 3'])
  })

  it('checkRelationships rejects a self-relationship', () => {
    expect(checkRelationships([{ name: 'Ada', relationships: { ada: 'self' } }])).toEqual([
      '"Ada" lists a relationship with itself',
    ])
  })
})
