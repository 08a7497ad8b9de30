/**
 * Zod validation schemas for the StoryLoom configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - generation (timeouts, backoff, variants)
 *  - context (token budget)
 *  - list cardinality bounds
 *  - routing (capability selection per task kind)
 *  - providers
 */

import { z } from 'zod'
import { CONTENT_KINDS } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    max_concurrent_generations: z.number().int().min(1).max(64),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Generation and context
// ---------------------------------------------------------------------------

export const GenerationSettingsSchema = z
  .object({
    /** Bounded wait for one capability call; exceeding it is a transient failure */
    attempt_timeout_ms: z.number().int().min(1),
    /** First retry delay; doubles on each further retry */
    backoff_base_ms: z.number().int().min(0),
    default_variants: z.number().int().min(1).max(5),
  })
  .strict()

export type GenerationSettings = z.infer<typeof GenerationSettingsSchema>

export const ContextSettingsSchema = z
  .object({
    /** Approximate token budget for sibling and reference context */
    token_budget: z.number().int().min(0),
  })
  .strict()

export type ContextSettings = z.infer<typeof ContextSettingsSchema>

// ---------------------------------------------------------------------------
// Cardinality
// ---------------------------------------------------------------------------

export const CardinalityBoundsSchema = z
  .object({
    min: z.number().int().min(1),
    max: z.number().int().min(1),
  })
  .strict()
  .refine((bounds) => bounds.min <= bounds.max, { message: 'min must not exceed max' })

export type CardinalityBounds = z.infer<typeof CardinalityBoundsSchema>

export const CardinalitySchema = z
  .object({
    character_list: CardinalityBoundsSchema,
    chapter_list: CardinalityBoundsSchema,
    scene_list: CardinalityBoundsSchema,
    panel_list: CardinalityBoundsSchema,
  })
  .strict()

export type CardinalityConfig = z.infer<typeof CardinalitySchema>
export type ListTaskKind = keyof CardinalityConfig

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

const ContentKindSchema = z.enum(CONTENT_KINDS)

export const RoutingRuleSchema = z
  .object({
    task_kind: ContentKindSchema,
    provider: z.string().min(1),
  })
  .strict()

export type RoutingRule = z.infer<typeof RoutingRuleSchema>

export const RoutingConfigSchema = z
  .object({
    default_provider: z.string().min(1),
    rules: z.array(RoutingRuleSchema),
  })
  .strict()

export type RoutingConfig = z.infer<typeof RoutingConfigSchema>

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

export const ClaudeCliProviderSchema = z
  .object({
    enabled: z.boolean(),
    /** Path to the CLI binary; defaults to `claude` on PATH */
    cli_path: z.string().optional(),
    model: z.string().optional(),
  })
  .strict()

export type ClaudeCliProviderConfig = z.infer<typeof ClaudeCliProviderSchema>

export const ScriptedProviderSchema = z
  .object({
    enabled: z.boolean(),
  })
  .strict()

export const ProvidersSchema = z
  .object({
    'claude-cli': ClaudeCliProviderSchema,
    scripted: ScriptedProviderSchema,
  })
  .strict()

export type ProvidersConfig = z.infer<typeof ProvidersSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const LoomConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    generation: GenerationSettingsSchema,
    context: ContextSettingsSchema,
    cardinality: CardinalitySchema,
    routing: RoutingConfigSchema,
    providers: ProvidersSchema,
  })
  .strict()

export type LoomConfig = z.infer<typeof LoomConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files and overrides before merging)
// ---------------------------------------------------------------------------

export const PartialLoomConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    generation: GenerationSettingsSchema.partial().optional(),
    context: ContextSettingsSchema.partial().optional(),
    cardinality: z
      .object({
        character_list: z.object({ min: z.number().int(), max: z.number().int() }).partial(),
        chapter_list: z.object({ min: z.number().int(), max: z.number().int() }).partial(),
        scene_list: z.object({ min: z.number().int(), max: z.number().int() }).partial(),
        panel_list: z.object({ min: z.number().int(), max: z.number().int() }).partial(),
      })
      .partial()
      .optional(),
    routing: RoutingConfigSchema.partial().optional(),
    providers: z
      .object({
        'claude-cli': ClaudeCliProviderSchema.partial(),
        scripted: ScriptedProviderSchema.partial(),
      })
      .partial()
      .optional(),
  })
  .strict()

export type PartialLoomConfig = z.infer<typeof PartialLoomConfigSchema>
