/**
 * Planwright - Main module exports
 * Public API surface for embedding the plan lifecycle orchestrator
 */

// Core types
export * from './core/types.js'

// Core errors
export * from './core/errors.js'

// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus, PlanEventName } from './core/event-bus.js'
export type { PlanEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Persisted artifact schemas
export * from './persistence/schemas/plan-records.js'

// Configuration
export * from './modules/config/index.js'

// Plan store
export * from './modules/plan-store/index.js'

// Extensions
export * from './modules/extensions/index.js'

// Task model
export * from './modules/task-model/index.js'

// Triage
export * from './modules/triage/index.js'

// Phase orchestrator
export * from './modules/phase-orchestrator/index.js'
