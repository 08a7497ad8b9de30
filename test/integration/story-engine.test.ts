/**
 * End-to-end runs through the engine façade: an idea grown into a full
 * hierarchy with the scripted provider, and instruction ordering as seen by
 * a provider.
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { createOrchestrator } from '../../src/core/orchestrator-impl.js'
import type { Orchestrator } from '../../src/core/orchestrator.js'
import type { EntityRef, TaskKind } from '../../src/core/types.js'
import type { GenerationProvider } from '../../src/adapters/generation-provider.js'
import type { ProviderCallOptions, ProviderRequest, ProviderResult } from '../../src/adapters/types.js'
import { DEFAULT_CONFIG } from '../../src/modules/config/defaults.js'
import type { LoomConfig } from '../../src/modules/config/config-schema.js'
import { seedEntities } from '../fixtures/story.js'

const config: LoomConfig = {
  ...DEFAULT_CONFIG,
  routing: { default_provider: 'scripted', rules: [] },
  providers: { 'claude-cli': { enabled: false }, scripted: { enabled: true } },
}

let engine: Orchestrator | undefined

async function start(providers: GenerationProvider[] = []): Promise<Orchestrator> {
  engine = await createOrchestrator({
    databasePath: ':memory:',
    config,
    providers,
    handleSignals: false,
    sleep: async () => undefined,
  })
  return engine
}

afterEach(async () => {
  await engine?.shutdown()
  engine = undefined
})

/** Generate in review mode, then accept the first variant */
async function generateAndAccept(
  loom: Orchestrator,
  taskKind: TaskKind,
  target: EntityRef,
  userInput?: string,
): Promise<string[]> {
  const outcome = await loom.waitForGeneration(loom.submitGeneration(taskKind, target, { userInput }))
  expect(outcome.error).toBeNull()
  expect(outcome.draft?.status).toBe('pending')
  const applied = await loom.selectDraft(outcome.draft?.id ?? '', 0)
  return applied.created.map((entity) => entity.id)
}

describe('story engine', () => {
  it('grows an idea into a project, cast, chapters, scenes and panels', async () => {
    const loom = await start()
    const project = loom.newProjectRef()

    const first = await loom.waitForGeneration(
      loom.submitGeneration('project_summary', project, { userInput: 'space detective story' }),
    )
    expect(first.generation).toMatchObject({ status: 'completed', attempt_count: 1 })
    expect(loom.listDrafts(project, { status: 'pending' })).toHaveLength(1)
    expect(first.draft?.variants).toHaveLength(1)

    await loom.selectDraft(first.draft?.id ?? '', 0)
    expect(loom.getDraft(first.draft?.id ?? '').status).toBe('applied')
    const stored = loom.store.require(project)
    expect(stored.fields['title']).toBe('Space Detective Story')
    expect(stored.fields['genre']).not.toBe('')

    const cast = await generateAndAccept(loom, 'character_list', project)
    expect(cast).toHaveLength(3)

    const chapters = await generateAndAccept(loom, 'chapter_list', project)
    expect(chapters).toHaveLength(2)

    const chapter = { kind: 'chapter' as const, id: chapters[0] ?? '' }
    const scenes = await generateAndAccept(loom, 'scene_list', chapter)
    expect(loom.store.children(chapter, 'scene').map((s) => s.fields['number'])).toEqual([1, 2])

    const scene = { kind: 'scene' as const, id: scenes[0] ?? '' }
    const panels = await generateAndAccept(loom, 'panel_list', scene)
    expect(panels).toHaveLength(3)

    const firstCastName = loom.store.children(project, 'character')[0]?.fields['name']
    expect(loom.store.require(scene).fields['characters']).toEqual([firstCastName])
    expect(loom.store.ancestors(scene).map((a) => a.id)).toEqual([chapter.id, project.id])
  })

  it('hands the provider the narrower scope first, whatever the priorities', async () => {
    const generate = vi.fn(
      async (_request: ProviderRequest, _options: ProviderCallOptions): Promise<ProviderResult> => ({
        variants: [
          {
            scenes: [
              { number: 1, title: 'Rainfall', description: 'Rain on the docks.', characters: ['Mira Voss'] },
              { number: 2, title: 'Dry dock', description: 'Shelter.', characters: [] },
            ],
          },
        ],
      }),
    )
    const recorder: GenerationProvider = {
      id: 'recorder',
      displayName: 'Recorder',
      healthCheck: async () => ({ healthy: true }),
      generate,
    }
    const loom = await start([recorder])
    seedEntities(loom.store)

    loom.addInstruction({
      scope: { kind: 'project', id: 'project-1' },
      contentKind: 'scene_list',
      text: 'Keep it bleak.',
      priority: 950,
    })
    loom.addInstruction({
      scope: { kind: 'chapter', id: 'chapter-1' },
      contentKind: 'all',
      text: 'Open on the rain.',
      priority: 900,
    })

    const outcome = await loom.waitForGeneration(
      loom.submitGeneration('scene_list', { kind: 'chapter', id: 'chapter-1' }, { provider: 'recorder' }),
    )

    expect(outcome.generation.status).toBe('completed')
    const body: unknown = JSON.parse(generate.mock.calls[0]?.[0].body ?? '{}')
    expect(body).toMatchObject({ context: { instructions: ['Open on the rain.', 'Keep it bleak.'] } })
  })
})
