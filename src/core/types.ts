/**
 * Core types for StoryLoom
 * Shared type definitions used across all modules
 */

/** Every kind of content entity stored in the hierarchy */
export type EntityKind = 'project' | 'chapter' | 'scene' | 'panel' | 'character' | 'location'

export const ENTITY_KINDS: readonly EntityKind[] = [
  'project',
  'chapter',
  'scene',
  'panel',
  'character',
  'location',
]

/** Entity kinds that can carry instructions, most specific first */
export const SCOPE_KINDS = ['panel', 'scene', 'chapter', 'project'] as const

export type ScopeKind = (typeof SCOPE_KINDS)[number]

/** Required parent kind for each entity kind (null for the root) */
export const PARENT_KIND: Readonly<Record<EntityKind, EntityKind | null>> = {
  project: null,
  chapter: 'project',
  scene: 'chapter',
  panel: 'scene',
  character: 'project',
  location: 'project',
}

export const CONTENT_KINDS = [
  'project_summary',
  'character_list',
  'chapter_list',
  'scene_list',
  'panel_list',
  'character_profile',
  'scene_summary',
  'visual_prompt',
] as const

/** Kind of generated content; one generation task exists per content kind */
export type ContentKind = (typeof CONTENT_KINDS)[number]

/** Generation tasks are keyed by the content kind they produce */
export type TaskKind = ContentKind

/** Content kinds an instruction may target; "all" matches every kind */
export const INSTRUCTION_CONTENT_KINDS = ['all', ...CONTENT_KINDS] as const

export type InstructionContentKind = (typeof INSTRUCTION_CONTENT_KINDS)[number]

/** Whether generated output is applied unattended or waits for review */
export const GENERATION_MODES = ['direct', 'review'] as const
export type GenerationMode = (typeof GENERATION_MODES)[number]

/** Enumerated intent attached to an instruction at write time */
export type Directive = GenerationMode

/** Draft lifecycle states */
export const DRAFT_STATUSES = ['pending', 'selected', 'rejected', 'revised', 'applied', 'superseded'] as const
export type DraftStatus = (typeof DRAFT_STATUSES)[number]

/** Generation attempt-chain states */
export type GenerationStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled'

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** Address of a content entity */
export interface EntityRef {
  kind: EntityKind
  id: string
}

export function isEntityKind(value: string): value is EntityKind {
  return ENTITY_KINDS.some((kind) => kind === value)
}

export function isContentKind(value: string): value is ContentKind {
  return CONTENT_KINDS.some((kind) => kind === value)
}

export function isScopeKind(value: string): value is ScopeKind {
  return SCOPE_KINDS.some((kind) => kind === value)
}

export function isDraftStatus(value: string): value is DraftStatus {
  return DRAFT_STATUSES.some((status) => status === value)
}

export function isGenerationMode(value: string): value is GenerationMode {
  return GENERATION_MODES.some((mode) => mode === value)
}

/**
 * Parse a `kind:id` reference.
 * @returns null when the kind is unknown or the id is empty
 */
export function parseRef(text: string): EntityRef | null {
  const separator = text.indexOf(':')
  if (separator <= 0) return null
  const kind = text.slice(0, separator)
  const id = text.slice(separator + 1)
  if (!isEntityKind(kind) || id === '') return null
  return { kind, id }
}

export function formatRef(ref: EntityRef): string {
  return `${ref.kind}:${ref.id}`
}
