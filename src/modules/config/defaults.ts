/**
 * Built-in default values for the StoryLoom configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type {
  CardinalityConfig,
  GlobalSettings,
  GenerationSettings,
  LoomConfig,
  RoutingConfig,
} from './config-schema.js'

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'warn',
  max_concurrent_generations: 4,
}

export const DEFAULT_GENERATION_SETTINGS: GenerationSettings = {
  attempt_timeout_ms: 120_000,
  backoff_base_ms: 500,
  default_variants: 1,
}

export const DEFAULT_CARDINALITY: CardinalityConfig = {
  character_list: { min: 3, max: 8 },
  chapter_list: { min: 2, max: 12 },
  scene_list: { min: 2, max: 10 },
  panel_list: { min: 3, max: 8 },
}

export const DEFAULT_ROUTING: RoutingConfig = {
  default_provider: 'claude-cli',
  rules: [],
}

export const DEFAULT_CONFIG: LoomConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  generation: DEFAULT_GENERATION_SETTINGS,
  context: { token_budget: 4000 },
  cardinality: DEFAULT_CARDINALITY,
  routing: DEFAULT_ROUTING,
  providers: {
    'claude-cli': { enabled: true },
    scripted: { enabled: true },
  },
}
