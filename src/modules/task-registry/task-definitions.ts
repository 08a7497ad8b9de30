/**
 * Built-in generation task definitions, one per content kind.
 */

import { z } from 'zod'
import type { ContentKind, EntityKind } from '../../core/types.js'
import { isPlainObject } from '../../utils/helpers.js'
import {
  checkCardinality,
  checkKnownCharacters,
  checkNumbering,
  checkRelationships,
  checkUniqueNames,
} from './cross-references.js'
import type { ListSpec, OutputShape, TaskDefinition, ValidationOutcome, ValidationRules } from './types.js'

// ---------------------------------------------------------------------------
// Output schemas
// ---------------------------------------------------------------------------

const text = z.string().trim().min(1)

export const SHOT_TYPES = ['close_up', 'medium_shot', 'wide_shot', 'establishing'] as const

export const ProjectSummarySchema = z.object({
  title: text,
  genre: text,
  description: text,
})

export const CharacterItemSchema = z.object({
  name: text,
  role: text,
  description: text,
  relationships: z.record(z.string(), z.string()).optional(),
})

export const CharacterListSchema = z.object({ characters: z.array(CharacterItemSchema) })

export const ChapterItemSchema = z.object({
  number: z.number().int().min(1),
  title: text,
  summary: text,
})

export const ChapterListSchema = z.object({ chapters: z.array(ChapterItemSchema) })

export const SceneItemSchema = z.object({
  number: z.number().int().min(1),
  title: text,
  description: text,
  characters: z.array(z.string()).optional(),
})

export const SceneListSchema = z.object({ scenes: z.array(SceneItemSchema) })

export const PanelItemSchema = z.object({
  number: z.number().int().min(1),
  shot_type: z.enum(SHOT_TYPES),
  description: text,
  dialogue: z.string().optional(),
  narration: z.string().optional(),
  characters: z.array(z.string()).optional(),
})

export const PanelListSchema = z.object({ panels: z.array(PanelItemSchema) })

export const CharacterProfileSchema = z.object({ name: text, biography: text })

export const SceneSummarySchema = z.object({ summary: text })

export const VisualPromptSchema = z.object({
  prompt: text,
  negative_prompt: z.string().optional(),
})

// ---------------------------------------------------------------------------
// defineTask
// ---------------------------------------------------------------------------

interface TaskSpec<S extends z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>> {
  kind: ContentKind
  label: string
  targetKinds: readonly EntityKind[]
  list?: ListSpec
  contextChildKind?: EntityKind
  includeRoster?: boolean
  rosterRequired?: boolean
  shape: OutputShape
  schema: S
  /** Checks beyond the schema; returns one message per violation */
  crossCheck?: (value: z.infer<S>, rules: ValidationRules) => string[]
}

function defineTask<S extends z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>>(
  spec: TaskSpec<S>,
): TaskDefinition {
  return {
    kind: spec.kind,
    label: spec.label,
    targetKinds: spec.targetKinds,
    list: spec.list ?? null,
    contextChildKind: spec.contextChildKind ?? spec.list?.childKind ?? null,
    includeRoster: spec.includeRoster ?? spec.rosterRequired ?? false,
    rosterRequired: spec.rosterRequired ?? false,
    shape: spec.shape,
    validate(raw: unknown, rules: ValidationRules): ValidationOutcome {
      const parsed = spec.schema.safeParse(raw)
      if (!parsed.success) {
        return {
          ok: false,
          issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
        }
      }
      const issues = spec.crossCheck?.(parsed.data, rules) ?? []
      return issues.length > 0 ? { ok: false, issues } : { ok: true, value: parsed.data }
    },
  }
}

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

export const TASK_DEFINITIONS: Readonly<Record<ContentKind, TaskDefinition>> = {
  project_summary: defineTask({
    kind: 'project_summary',
    label: 'Project summary',
    targetKinds: ['project'],
    shape: { title: 'string', genre: 'string', description: 'string' },
    schema: ProjectSummarySchema,
  }),

  character_list: defineTask({
    kind: 'character_list',
    label: 'Character list',
    targetKinds: ['project'],
    list: { kind: 'character_list', itemsKey: 'characters', childKind: 'character' },
    shape: {
      characters: [
        { name: 'string', role: 'string', description: 'string', relationships: 'record<name, string>?' },
      ],
    },
    schema: CharacterListSchema,
    crossCheck: (value, rules) => [
      ...checkCardinality(value.characters.length, rules.cardinality),
      ...checkUniqueNames(value.characters),
      ...checkRelationships(value.characters),
    ],
  }),

  chapter_list: defineTask({
    kind: 'chapter_list',
    label: 'Chapter list',
    targetKinds: ['project'],
    list: { kind: 'chapter_list', itemsKey: 'chapters', childKind: 'chapter' },
    rosterRequired: true,
    shape: { chapters: [{ number: 'integer', title: 'string', summary: 'string' }] },
    schema: ChapterListSchema,
    crossCheck: (value, rules) => [
      ...checkCardinality(value.chapters.length, rules.cardinality),
      ...checkNumbering(value.chapters),
    ],
  }),

  scene_list: defineTask({
    kind: 'scene_list',
    label: 'Scene list',
    targetKinds: ['chapter'],
    list: { kind: 'scene_list', itemsKey: 'scenes', childKind: 'scene' },
    rosterRequired: true,
    shape: {
      scenes: [{ number: 'integer', title: 'string', description: 'string', characters: 'string[]?' }],
    },
    schema: SceneListSchema,
    crossCheck: (value, rules) => [
      ...checkCardinality(value.scenes.length, rules.cardinality),
      ...checkNumbering(value.scenes),
      ...checkKnownCharacters('scenes', value.scenes, rules.rosterNames),
    ],
  }),

  panel_list: defineTask({
    kind: 'panel_list',
    label: 'Panel list',
    targetKinds: ['scene'],
    list: { kind: 'panel_list', itemsKey: 'panels', childKind: 'panel' },
    rosterRequired: true,
    shape: {
      panels: [
        {
          number: 'integer',
          shot_type: SHOT_TYPES.join(' | '),
          description: 'string',
          dialogue: 'string?',
          narration: 'string?',
          characters: 'string[]?',
        },
      ],
    },
    schema: PanelListSchema,
    crossCheck: (value, rules) => [
      ...checkCardinality(value.panels.length, rules.cardinality),
      ...checkNumbering(value.panels),
      ...checkKnownCharacters('panels', value.panels, rules.rosterNames),
    ],
  }),

  character_profile: defineTask({
    kind: 'character_profile',
    label: 'Character profile',
    targetKinds: ['character'],
    shape: { name: 'string', biography: 'string' },
    schema: CharacterProfileSchema,
  }),

  scene_summary: defineTask({
    kind: 'scene_summary',
    label: 'Scene summary',
    targetKinds: ['scene'],
    contextChildKind: 'panel',
    includeRoster: true,
    shape: { summary: 'string' },
    schema: SceneSummarySchema,
  }),

  visual_prompt: defineTask({
    kind: 'visual_prompt',
    label: 'Visual prompt',
    targetKinds: ['panel', 'character', 'location'],
    includeRoster: true,
    shape: { prompt: 'string', negative_prompt: 'string?' },
    schema: VisualPromptSchema,
  }),
}

export function getTaskDefinition(kind: ContentKind): TaskDefinition {
  return TASK_DEFINITIONS[kind]
}

/**
 * The item array of a validated list-task variant.
 */
export function listItems(definition: TaskDefinition, value: Record<string, unknown>): Record<string, unknown>[] {
  if (definition.list === null) return []
  const items = value[definition.list.itemsKey]
  if (!Array.isArray(items)) return []
  return items.filter(isPlainObject)
}
