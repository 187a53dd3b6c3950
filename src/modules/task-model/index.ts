/**
 * Task/deliverable model: public API
 */

export { detectCycle, validateDependencies, orderByDependencies } from './dependency-resolver.js'
export type { DependencyGraph } from './dependency-resolver.js'
export { prepareDeliverables } from './deliverables.js'
export type { PrepareDeliverablesOptions } from './deliverables.js'
export { deriveTasks, orderProfiles } from './task-deriver.js'
export {
  recordStepOutcome,
  blockTask,
  setTaskStatus,
  readyTasks,
  blockDependents,
  isTaskSettled,
  isExecutionSettled,
  createFixTask,
  addFixTask,
  nextTaskNumber,
} from './task-tracker.js'
export type { StepOutcomeOptions } from './task-tracker.js'
export { checkReferentialIntegrity } from './integrity.js'
export type { DeriveTasksOptions, FixTaskOptions, FixGroup, BlockPropagation } from './types.js'
