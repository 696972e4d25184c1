/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, deepMerge, readEnvOverrides } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  ColloquyConfigSchema,
  PartialColloquyConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type {
  ColloquyConfig,
  PartialColloquyConfig,
  AgentEntry,
  ProviderConfig,
  TimeoutsConfig,
  GlobalSettings,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
