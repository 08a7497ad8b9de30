/**
 * Tests for `loom generate` and `loom status`, run against a scratch project
 * routed to the scripted provider.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { join } from 'node:path'
import { runGenerateAction } from '../generate.js'
import type { GenerateActionOptions } from '../generate.js'
import { runStatusAction } from '../status.js'
import {
  STORY_IDEA,
  createStoryProject,
  generateDraft,
  makeScratchDir,
  makeScriptedProject,
  parseJson,
  pick,
  removeScratch,
  run,
} from './cli-test-helpers.js'
import type { ScratchProject } from './cli-test-helpers.js'

let scratch: ScratchProject

beforeEach(async () => {
  scratch = await makeScriptedProject('generate')
})

afterEach(async () => {
  await removeScratch(scratch)
  vi.restoreAllMocks()
})

function generate(options: Partial<GenerateActionOptions> & { taskKind: string; target: string }) {
  return run(() => runGenerateAction({ ...scratch, children: false, outputFormat: 'human', ...options }))
}

// ---------------------------------------------------------------------------
// generate
// ---------------------------------------------------------------------------

describe('runGenerateAction', () => {
  it('creates a pending draft for a new project in review mode', async () => {
    const result = await generate({
      taskKind: 'project_summary',
      target: 'project:new',
      input: STORY_IDEA,
      outputFormat: 'json',
    })

    expect(result.exitCode).toBe(0)
    const outcome = pick(parseJson(result.stdout), 'outcomes', 0)
    expect(outcome).toMatchObject({
      mode: 'review',
      applied: null,
      error: null,
      generation: { task_kind: 'project_summary', target_kind: 'project', status: 'completed', attempt_count: 1 },
      draft: { status: 'pending', content_kind: 'project_summary' },
    })
    expect(pick(outcome, 'draft', 'variants')).toEqual([
      {
        title: 'Space Detective Story',
        genre: 'mystery science fiction',
        description: 'A story about space detective story.',
      },
    ])
  })

  it('renders the outcome for humans', async () => {
    const projectId = await createStoryProject(scratch)

    const result = await generate({ taskKind: 'project_summary', target: `project:${projectId}` })

    expect(result.exitCode).toBe(0)
    const [status, draft] = result.stdout.split('\n\n')
    expect(status).toMatch(/^Generation \S+: completed after 1 attempt\n {2}Mode: review$/)
    expect(draft).toMatch(new RegExp(`^Draft \\S+ \\[pending\\] project_summary for project:${projectId}\\n`))
    expect(draft?.endsWith(
      '  [0] {"title":"Space Detective Story","genre":"mystery science fiction",' +
        '"description":"A story about Space Detective Story."}\n',
    )).toBe(true)
  })

  it('applies directly with --mode direct and lists what was created', async () => {
    const projectId = await createStoryProject(scratch)

    const result = await generate({ taskKind: 'character_list', target: `project:${projectId}`, mode: 'direct' })

    expect(result.exitCode).toBe(0)
    expect(result.stdout).toContain('\n  Mode: direct\n')
    expect(result.stdout).toContain(`\n\nApplied to project:${projectId} (version 1)\n  Created: character:`)
  })

  it('runs once per child with --children', async () => {
    const projectId = await createStoryProject(scratch)
    await generate({ taskKind: 'character_list', target: `project:${projectId}`, mode: 'direct' })
    await generate({ taskKind: 'chapter_list', target: `project:${projectId}`, mode: 'direct' })

    const result = await generate({
      taskKind: 'scene_list',
      target: `project:${projectId}`,
      mode: 'direct',
      children: true,
      outputFormat: 'json',
    })

    expect(result.exitCode).toBe(0)
    const outcomes = pick(parseJson(result.stdout), 'outcomes')
    expect(outcomes).toHaveLength(2)
    expect(outcomes).toMatchObject([
      { generation: { target_kind: 'chapter' }, draft: { status: 'applied' } },
      { generation: { target_kind: 'chapter' }, draft: { status: 'applied' } },
    ])
  })

  it('reports when a target has no children to fan out to', async () => {
    const projectId = await createStoryProject(scratch)

    const result = await generate({ taskKind: 'scene_list', target: `project:${projectId}`, children: true })

    expect(result.exitCode).toBe(0)
    expect(result.stdout).toBe('')
    expect(result.stderr).toBe('Nothing to generate: the target has no children of the right kind.\n')
  })

  it('rejects an unknown task kind as a usage error', async () => {
    const result = await generate({ taskKind: 'poem', target: 'scene:scene-1' })

    expect(result.exitCode).toBe(2)
    expect(result.stderr).toBe('Error: Unknown task kind "poem"\n')
  })

  it('reports usage errors as json when asked', async () => {
    const result = await generate({ taskKind: 'scene_summary', target: 'scene', outputFormat: 'json' })

    expect(result.exitCode).toBe(2)
    expect(parseJson(result.stdout)).toEqual({
      error: {
        code: 'INVALID_REQUEST',
        message: 'Invalid target "scene"; expected kind:id such as scene:scene-1',
      },
    })
  })

  it('rejects a non-numeric variant count', async () => {
    const result = await generate({ taskKind: 'scene_summary', target: 'scene:scene-1', variants: 'two' })

    expect(result.exitCode).toBe(2)
    expect(result.stderr).toBe('Error: variants must be an integer, got "two"\n')
  })

  it('treats a missing target as a usage error', async () => {
    const result = await generate({ taskKind: 'scene_summary', target: 'scene:nowhere' })

    expect(result.exitCode).toBe(2)
    expect(result.stderr.startsWith('Error: ')).toBe(true)
  })

  it('asks for init when the project has no database', async () => {
    const empty = await makeScratchDir('generate-empty')
    try {
      const result = await run(() =>
        runGenerateAction({ ...empty, taskKind: 'scene_summary', target: 'scene:scene-1', children: false, outputFormat: 'human' }),
      )

      const dbPath = join(empty.projectRoot, '.storyloom', 'state.db')
      expect(result.exitCode).toBe(2)
      expect(result.stderr).toBe(`Error: No StoryLoom database found at ${dbPath}. Run 'loom init' first.\n`)
    } finally {
      await removeScratch(empty)
    }
  })
})

// ---------------------------------------------------------------------------
// status
// ---------------------------------------------------------------------------

describe('runStatusAction', () => {
  it('prints the recorded status of a finished generation', async () => {
    const { generationId } = await generateDraft(scratch, 'project_summary', 'project:new', { input: STORY_IDEA })

    const result = await run(() => runStatusAction({ ...scratch, generationId, outputFormat: 'human' }))

    expect(result.exitCode).toBe(0)
    expect(result.stdout).toBe(`Generation ${generationId}: completed after 1 attempt\n`)
  })

  it('prints the report as json', async () => {
    const { generationId } = await generateDraft(scratch, 'project_summary', 'project:new', { input: STORY_IDEA })

    const result = await run(() => runStatusAction({ ...scratch, generationId, outputFormat: 'json' }))

    expect(parseJson(result.stdout)).toEqual({
      generationId,
      status: 'completed',
      attemptCount: 1,
      error: null,
      errorCode: null,
    })
  })

  it('exits with the usage code for an unknown generation', async () => {
    const result = await run(() =>
      runStatusAction({ ...scratch, generationId: 'gen-missing', outputFormat: 'human' }),
    )

    expect(result.exitCode).toBe(2)
    expect(result.stderr).toBe('Error: Generation not found: gen-missing\n')
  })
})
