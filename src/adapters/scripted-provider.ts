/**
 * Scripted provider
 *
 * Deterministic in-process provider: derives every payload from the request
 * document alone. Used for offline runs, demos and end-to-end tests.
 */

import { z } from 'zod'
import type { TaskKind } from '../core/types.js'
import { SHOT_TYPES } from '../modules/task-registry/task-definitions.js'
import { normalizeCharacterName } from '../modules/task-registry/cross-references.js'
import { CapabilityError } from '../core/errors.js'
import type { GenerationProvider } from './generation-provider.js'
import type { ProviderHealthResult, ProviderRequest, ProviderResult } from './types.js'

// ---------------------------------------------------------------------------
// Request document (only the parts this provider reads)
// ---------------------------------------------------------------------------

const EntitySnapshotSchema = z.object({
  fields: z.record(z.string(), z.unknown()),
})

const RequestDocumentSchema = z.object({
  output: z.object({
    cardinality: z.object({ min: z.number().int(), max: z.number().int() }).nullable(),
  }),
  context: z.object({
    target: EntitySnapshotSchema.nullable(),
    ancestors: z.array(EntitySnapshotSchema),
    existingChildren: z.array(EntitySnapshotSchema),
    rosterNames: z.array(z.string()),
    styleGuide: z.string().nullable(),
    userInput: z.string().nullable(),
    feedback: z.object({ text: z.string() }).nullable(),
  }),
})

type RequestDocument = z.infer<typeof RequestDocumentSchema>

// ---------------------------------------------------------------------------
// Word lists
// ---------------------------------------------------------------------------

const FIRST_NAMES = ['Ada', 'Bram', 'Cora', 'Dex', 'Elin', 'Finn', 'Greta', 'Hugo']
const LAST_NAMES = ['Marsh', 'Quill', 'Rowe', 'Stroud', 'Thorne', 'Vale']
const ROLES = ['protagonist', 'antagonist', 'supporting']

const GENRE_KEYWORDS: ReadonlyArray<readonly [string, string]> = [
  ['detective', 'mystery'],
  ['murder', 'mystery'],
  ['space', 'science fiction'],
  ['robot', 'science fiction'],
  ['dragon', 'fantasy'],
  ['magic', 'fantasy'],
  ['ghost', 'horror'],
  ['love', 'romance'],
]

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function text(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : fallback
}

function titleCase(words: string): string {
  return words
    .split(/\s+/)
    .filter((w) => w !== '')
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(' ')
}

function detectGenre(idea: string): string {
  const lowered = idea.toLowerCase()
  const genres = GENRE_KEYWORDS.filter(([keyword]) => lowered.includes(keyword)).map(([, genre]) => genre)
  const unique = Array.from(new Set(genres))
  return unique.length > 0 ? unique.join(' ') : 'drama'
}

/** Suffix that tells variants apart; empty for the first */
function take(variant: number): string {
  return variant === 0 ? '' : ` (take ${String(variant + 1)})`
}

function itemCount(doc: RequestDocument): number {
  return Math.max(doc.output.cardinality?.min ?? 1, 1)
}

function projectTitle(doc: RequestDocument): string {
  const root = doc.context.ancestors.at(-1) ?? doc.context.target
  return text(root?.fields['title'], 'Untitled')
}

function feedbackNote(doc: RequestDocument): string {
  return doc.context.feedback === null ? '' : ` Revised: ${doc.context.feedback.text}`
}

/** Names not yet used by `taken` (compared case-insensitively) */
function freshNames(count: number, taken: readonly string[]): string[] {
  const used = new Set(taken.map(normalizeCharacterName))
  const names: string[] = []
  for (const last of LAST_NAMES) {
    for (const first of FIRST_NAMES) {
      const name = `${first} ${last}`
      if (used.has(normalizeCharacterName(name))) continue
      names.push(name)
      if (names.length === count) return names
    }
  }
  return names
}

// ---------------------------------------------------------------------------
// Payload builders
// ---------------------------------------------------------------------------

type PayloadBuilder = (doc: RequestDocument, variant: number) => Record<string, unknown>

const BUILDERS: Readonly<Record<TaskKind, PayloadBuilder>> = {
  project_summary: (doc, variant) => {
    const idea = text(doc.context.userInput, text(doc.context.target?.fields['title'], 'untitled story'))
    return {
      title: `${titleCase(idea)}${take(variant)}`,
      genre: detectGenre(idea),
      description: `A story about ${idea}.${feedbackNote(doc)}`,
    }
  },

  character_list: (doc, variant) => {
    const existing = doc.context.existingChildren.map((c) => text(c.fields['name'], ''))
    const names = freshNames(itemCount(doc) + variant, existing).slice(variant)
    return {
      characters: names.map((name, i) => ({
        name,
        role: ROLES[i % ROLES.length] ?? 'supporting',
        description: `${name} has a stake in ${projectTitle(doc)}.${feedbackNote(doc)}`,
        ...(i === 0 && names[1] !== undefined ? { relationships: { [names[1]]: 'rival' } } : {}),
      })),
    }
  },

  chapter_list: (doc, variant) => ({
    chapters: Array.from({ length: itemCount(doc) }, (_, i) => ({
      number: i + 1,
      title: `Chapter ${String(i + 1)}${take(variant)}`,
      summary: `Part ${String(i + 1)} of ${projectTitle(doc)}.${feedbackNote(doc)}`,
    })),
  }),

  scene_list: (doc, variant) => {
    const cast = doc.context.rosterNames.slice(0, 1)
    const chapter = text(doc.context.target?.fields['title'], 'the chapter')
    return {
      scenes: Array.from({ length: itemCount(doc) }, (_, i) => ({
        number: i + 1,
        title: `Scene ${String(i + 1)}${take(variant)}`,
        description: `Beat ${String(i + 1)} of ${chapter}.${feedbackNote(doc)}`,
        characters: cast,
      })),
    }
  },

  panel_list: (doc, variant) => {
    const cast = doc.context.rosterNames.slice(0, 1)
    const scene = text(doc.context.target?.fields['title'], 'the scene')
    return {
      panels: Array.from({ length: itemCount(doc) }, (_, i) => ({
        number: i + 1,
        shot_type: SHOT_TYPES[(i + variant) % SHOT_TYPES.length] ?? 'medium_shot',
        description: `Panel ${String(i + 1)} of ${scene}.${feedbackNote(doc)}`,
        characters: cast,
      })),
    }
  },

  character_profile: (doc, variant) => {
    const name = text(doc.context.target?.fields['name'], 'Unnamed')
    const role = text(doc.context.target?.fields['role'], 'character')
    return {
      name,
      biography: `${name} is the ${role} of ${projectTitle(doc)}.${take(variant)}${feedbackNote(doc)}`,
    }
  },

  scene_summary: (doc, variant) => {
    const description = text(doc.context.target?.fields['description'], 'A scene.')
    return { summary: `${description}${take(variant)}${feedbackNote(doc)}` }
  },

  visual_prompt: (doc, variant) => {
    const subject = text(
      doc.context.target?.fields['description'],
      text(doc.context.target?.fields['name'], 'the subject'),
    )
    const style = doc.context.styleGuide === null ? '' : ` Style: ${doc.context.styleGuide}`
    return {
      prompt: `${subject}${take(variant)}${style}${feedbackNote(doc)}`,
      negative_prompt: 'blurry, text, watermark',
    }
  },
}

// ---------------------------------------------------------------------------
// ScriptedProvider
// ---------------------------------------------------------------------------

export class ScriptedProvider implements GenerationProvider {
  readonly id = 'scripted'
  readonly displayName = 'Scripted'

  async healthCheck(): Promise<ProviderHealthResult> {
    return { healthy: true, version: 'builtin' }
  }

  async generate(request: ProviderRequest): Promise<ProviderResult> {
    const parsed = RequestDocumentSchema.safeParse(JSON.parse(request.body))
    if (!parsed.success) {
      throw new CapabilityError('Scripted provider cannot read the request document', 'unsupported', false, {
        issues: parsed.error.issues.map((i) => i.message),
      })
    }
    const build = BUILDERS[request.taskKind]
    const variants = Array.from({ length: request.variants }, (_, variant) => build(parsed.data, variant))
    return { variants, model: 'scripted' }
  }
}
