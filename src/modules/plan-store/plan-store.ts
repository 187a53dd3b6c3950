/**
 * PlanStore interface: durable, per-plan artifact storage.
 *
 * A plan is stored as five artifacts (plan record, intake, deliverables,
 * tasks, findings). Every commit is atomic over the artifacts it carries:
 * after a crash either all of them are visible or none is.
 */

import type { StorageBackend } from '../config/config-schema.js'
import type { PlanRecord, PlanState } from '../../persistence/schemas/plan-records.js'
import type { CommitOptions, PlanStateUpdate } from './types.js'

export interface PlanStore {
  readonly backend: StorageBackend

  /**
   * Persist a new plan with all of its artifacts.
   * @throws {PlanStoreError} when a plan with the same id already exists
   */
  create(state: PlanState): Promise<void>

  /**
   * Load a plan, recovering any interrupted commit first.
   * @throws {PlanNotFoundError} when no plan has the id
   * @throws {PlanStoreError} when a stored artifact does not validate
   */
  load(planId: string): Promise<PlanState>

  /**
   * Replace the given artifacts of an existing plan in one atomic commit.
   * The plan record is always rewritten with the next revision.
   * @returns the revision the commit produced
   * @throws {PlanNotFoundError} when no plan has the id
   * @throws {PlanConflictError} when `expectedRevision` is no longer the stored one
   */
  commit(planId: string, update: PlanStateUpdate, options?: CommitOptions): Promise<number>

  exists(planId: string): Promise<boolean>

  /** Plan records of every stored plan, oldest first */
  list(): Promise<PlanRecord[]>

  close(): Promise<void>
}
