/**
 * Extension registry: public API
 */

export { ExtensionRegistry, ExtensionRegistryBuilder, createExtensionRegistry } from './extension-registry.js'
export { CAPABILITIES } from './types.js'
export { invokeExternal, withTimeout } from './external-call.js'
export type { ExternalCallOptions, ExternalCallResult } from './external-call.js'
export type {
  Capability,
  CapabilityHandlers,
  ExtensionMap,
  Outliner,
  OutlineInput,
  Triager,
  TriageResult,
  ChangeTypeAgent,
} from './types.js'
