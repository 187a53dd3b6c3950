/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, ENV_VAR_MAP, coerceScalar } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  PlanwrightConfigSchema,
  PartialPlanwrightConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type {
  PlanwrightConfig,
  PartialPlanwrightConfig,
  PlanSettings,
  TriageSettings,
  DomainRoute,
  StorageBackend,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
