/**
 * Types for the plan store module.
 */

import type { PlanState } from '../../persistence/schemas/plan-records.js'

/** Subset of a plan's artifacts written together in one atomic commit */
export type PlanStateUpdate = Partial<PlanState>

export interface CommitOptions {
  /**
   * Revision the caller loaded. The commit is refused with
   * PlanConflictError when the stored plan has moved on.
   */
  expectedRevision?: number
}

export interface FilePlanStoreOptions {
  /** Storage root; plans live under `<root>/plans/<planId>/` */
  root: string
  /** How long to wait for another process's commit lock (default 10s) */
  lockTimeoutMs?: number
  /** A commit lock older than this is left over from a crash and is taken over (default 30s) */
  staleLockMs?: number
}

export interface SqlitePlanStoreOptions {
  /** Database file path, or ':memory:' */
  path: string
}
