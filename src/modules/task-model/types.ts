/**
 * Types for the task/deliverable model.
 */

import type { Deliverable, Finding } from '../../persistence/schemas/plan-records.js'

/** Options for expanding deliverables into tasks */
export interface DeriveTasksOptions {
  /** Profile order; a deliverable's profiles expand in this order, unknown ones last */
  profileOrder: readonly string[]
  /** Executor ref for a deliverable's task of the given profile */
  executorFor: (deliverable: Deliverable, profile: string) => string
  /** Number of the first task created (default 1) */
  startNumber?: number
  /** Timestamp stamped on the new tasks */
  now: string
}

/** Options for building a fix-task from findings */
export interface FixTaskOptions {
  number: number
  /** Domain the findings resolved to */
  domain: string
  executor: string
  /** Verify run the findings came from */
  verifyIteration: number
  now: string
}

/** Findings coalesced into one fix-task, keyed by file (or module) */
export interface FixGroup {
  target: string
  domain: string
  findings: Finding[]
}

/** Result of propagating blocked dependencies */
export interface BlockPropagation<T> {
  tasks: T[]
  /** Task numbers newly marked blocked */
  blocked: number[]
}
