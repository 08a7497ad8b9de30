/**
 * Tests for ScriptedProvider
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { ScriptedProvider } from '../../src/adapters/scripted-provider.js'
import type { ProviderResult } from '../../src/adapters/types.js'
import type { ContentKind, EntityRef } from '../../src/core/types.js'
import { createContextAssembler } from '../../src/modules/context-assembler/context-assembler-impl.js'
import type { ContextAssembler } from '../../src/modules/context-assembler/context-assembler.js'
import type { GenerationContext } from '../../src/modules/context-assembler/types.js'
import { createInstructionResolver } from '../../src/modules/instruction-resolver/instruction-resolver-impl.js'
import { DEFAULT_CARDINALITY } from '../../src/modules/config/defaults.js'
import { TASK_DEFINITIONS } from '../../src/modules/task-registry/task-definitions.js'
import { buildRequestBody } from '../../src/modules/generation-executor/request-builder.js'
import { seedStory } from '../fixtures/story.js'

let assembler: ContextAssembler
const provider = new ScriptedProvider()

beforeEach(() => {
  const story = seedStory()
  assembler = createContextAssembler({
    store: story.store,
    resolver: createInstructionResolver({ db: story.db, store: story.store }),
    tokenBudget: 4000,
    cardinality: DEFAULT_CARDINALITY,
  })
})

async function run(
  taskKind: ContentKind,
  target: EntityRef,
  variants = 1,
  userInput?: string,
): Promise<{ context: GenerationContext; result: ProviderResult }> {
  const context = assembler.assemble({ taskKind, target, userInput: userInput ?? null })
  const result = await provider.generate({
    generationId: 'gen-1',
    taskKind,
    body: buildRequestBody(context, TASK_DEFINITIONS[taskKind], variants),
    shape: TASK_DEFINITIONS[taskKind].shape,
    variants,
  })
  return { context, result }
}

describe('ScriptedProvider', () => {
  it('derives a project summary from the user idea', async () => {
    const { result } = await run('project_summary', { kind: 'project', id: 'project-new' }, 1, 'space detective story')
    expect(result.variants).toEqual([
      {
        title: 'Space Detective Story',
        genre: 'mystery science fiction',
        description: 'A story about space detective story.',
      },
    ])
  })

  it('names new characters that do not clash with existing ones', async () => {
    const { result } = await run('character_list', { kind: 'project', id: 'project-1' })
    expect(result.variants[0]).toEqual({
      characters: [
        {
          name: 'Ada Marsh',
          role: 'protagonist',
          description: 'Ada Marsh has a stake in Star Harbor.',
          relationships: { 'Bram Marsh': 'rival' },
        },
        { name: 'Bram Marsh', role: 'antagonist', description: 'Bram Marsh has a stake in Star Harbor.' },
        { name: 'Cora Marsh', role: 'supporting', description: 'Cora Marsh has a stake in Star Harbor.' },
      ],
    })
  })

  it('returns distinct variants', async () => {
    const { result } = await run('scene_summary', { kind: 'scene', id: 'scene-1' }, 2)
    expect(result.variants).toEqual([
      { summary: 'Scene 1 on the docks.' },
      { summary: 'Scene 1 on the docks. (take 2)' },
    ])
  })

  it.each<[ContentKind, EntityRef]>([
    ['project_summary', { kind: 'project', id: 'project-1' }],
    ['character_list', { kind: 'project', id: 'project-1' }],
    ['chapter_list', { kind: 'project', id: 'project-1' }],
    ['scene_list', { kind: 'chapter', id: 'chapter-1' }],
    ['panel_list', { kind: 'scene', id: 'scene-1' }],
    ['character_profile', { kind: 'character', id: 'character-1' }],
    ['scene_summary', { kind: 'scene', id: 'scene-1' }],
    ['visual_prompt', { kind: 'panel', id: 'panel-1' }],
  ])('produces %s output that passes its own validation', async (taskKind, target) => {
    const { context, result } = await run(taskKind, target, 3)
    const rules = { cardinality: context.cardinality, rosterNames: context.rosterNames }
    expect(result.variants).toHaveLength(3)
    for (const variant of result.variants) {
      expect(TASK_DEFINITIONS[taskKind].validate(variant, rules)).toMatchObject({ ok: true })
    }
  })

  it('rejects a request document it cannot read as a permanent failure', async () => {
    await expect(
      provider.generate({ generationId: 'gen-1', taskKind: 'scene_summary', body: '{}', shape: {}, variants: 1 }),
    ).rejects.toMatchObject({ reason: 'unsupported', transient: false })
  })
})
