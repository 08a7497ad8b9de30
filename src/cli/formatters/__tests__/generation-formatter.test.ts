import { describe, it, expect } from 'vitest'
import type { GenerationOutcome } from '../../../core/orchestrator.js'
import type { Draft } from '../../../persistence/queries/drafts.js'
import type { ContentEntity } from '../../../persistence/queries/entities.js'
import type { Generation } from '../../../persistence/queries/generations.js'
import {
  renderApplied,
  renderDraft,
  renderOutcome,
  renderProviderTable,
  renderStatus,
} from '../generation-formatter.js'

const NOW = '2026-01-01T00:00:00.000Z'

function generation(overrides: Partial<Generation> = {}): Generation {
  return {
    id: 'gen-1',
    task_kind: 'character_list',
    target_kind: 'project',
    target_id: 'project-1',
    provider: 'scripted',
    status: 'completed',
    attempt_count: 1,
    error: null,
    error_code: null,
    started_at: NOW,
    finished_at: NOW,
    created_at: NOW,
    updated_at: NOW,
    runner_host: 'studio-1',
    runner_pid: 4242,
    ...overrides,
  }
}

function draft(overrides: Partial<Draft> = {}): Draft {
  return {
    id: 'draft-1',
    target_kind: 'project',
    target_id: 'project-1',
    content_kind: 'character_list',
    variants: [{ characters: [] }],
    status: 'pending',
    feedback: null,
    created_from_draft_id: null,
    generation_id: 'gen-1',
    selected_variant: null,
    system_error: null,
    created_at: NOW,
    updated_at: NOW,
    ...overrides,
  }
}

function entity(kind: ContentEntity['kind'], id: string, version = 1): ContentEntity {
  return {
    kind,
    id,
    parent_kind: null,
    parent_id: null,
    position: 0,
    fields: {},
    version,
    deleted_at: null,
    created_at: NOW,
    updated_at: NOW,
  }
}

describe('renderStatus', () => {
  it('pluralizes attempts and shows the error code', () => {
    expect(
      renderStatus({
        generationId: 'gen-1',
        status: 'failed',
        attemptCount: 3,
        error: 'provider timed out',
        errorCode: 'TIMEOUT',
      }),
    ).toBe('Generation gen-1: failed after 3 attempts\n  Error [TIMEOUT]: provider timed out')
  })
})

describe('renderDraft', () => {
  it('shows revision lineage, feedback and errors', () => {
    const text = renderDraft(
      draft({
        status: 'rejected',
        created_from_draft_id: 'draft-0',
        feedback: 'More villains.',
        selected_variant: 0,
        system_error: 'character "Ada Marsh" already exists',
      }),
    )

    expect(text).toBe(
      [
        'Draft draft-1 [rejected] character_list for project:project-1',
        '  Revises: draft-0',
        '  Feedback: More villains.',
        '  Selected variant: 0',
        '  Error: character "Ada Marsh" already exists',
        '  [0] {"characters":[]}',
      ].join('\n'),
    )
  })
})

describe('renderApplied', () => {
  it('lists created children', () => {
    const text = renderApplied({
      target: entity('project', 'project-1', 2),
      created: [entity('character', 'character-1'), entity('character', 'character-2')],
    })

    expect(text).toBe('Applied to project:project-1 (version 2)\n  Created: character:character-1, character:character-2')
  })
})

describe('renderOutcome', () => {
  it('reports an apply failure that the generation record does not carry', () => {
    const outcome: GenerationOutcome = {
      generation: generation(),
      draft: draft({ status: 'rejected' }),
      mode: 'direct',
      applied: null,
      error: { code: 'VALIDATION_ERROR', message: 'duplicate character' },
    }

    expect(renderOutcome(outcome).split('\n\n')[0]).toBe(
      'Generation gen-1: completed after 1 attempt\n' +
        '  Mode: direct\n' +
        '  Apply failed [VALIDATION_ERROR]: duplicate character',
    )
  })

  it('shows only the status for a failed chain', () => {
    const outcome: GenerationOutcome = {
      generation: generation({ status: 'failed', attempt_count: 3, error: 'refused', error_code: 'CAPABILITY_ERROR' }),
      draft: null,
      mode: 'review',
      applied: null,
      error: { code: 'CAPABILITY_ERROR', message: 'refused' },
    }

    expect(renderOutcome(outcome)).toBe(
      'Generation gen-1: failed after 3 attempts\n  Error [CAPABILITY_ERROR]: refused\n  Mode: review',
    )
  })
})

describe('renderProviderTable', () => {
  it('shows the version of a healthy provider and the error of a broken one', () => {
    const table = renderProviderTable([
      { providerId: 'scripted', displayName: 'Scripted', health: { healthy: true, version: 'builtin' } },
      { providerId: 'claude-cli', displayName: 'Claude CLI', health: { healthy: false, error: 'not installed' } },
    ])

    expect(table.split('\n')).toEqual([
      'ID         | Name       | Healthy | Detail',
      '-----------+------------+---------+--------------',
      'scripted   | Scripted   | yes     | builtin',
      'claude-cli | Claude CLI | no      | not installed',
    ])
  })
})
