/**
 * Barrel exports for the config module.
 */

export {
  createConfigSystem,
  ConfigSystemImpl,
  CONFIG_DIR_NAME,
  ENV_VAR_MAP,
  coerceScalar,
  getByPath,
  setByPath,
} from './config-system-impl.js'
export type { ConfigLayer, ConfigSource, ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  LoomConfigSchema,
  PartialLoomConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type {
  LoomConfig,
  PartialLoomConfig,
  CardinalityBounds,
  CardinalityConfig,
  ListTaskKind,
  RoutingConfig,
  RoutingRule,
  ClaudeCliProviderConfig,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
