/**
 * PhaseOrchestrator interface.
 *
 * Drives plans through the seven-phase lifecycle
 * (init → refine → outline → plan → execute → verify → finalize) with
 * bounded loop-backs, suspension for external decisions and cancellation.
 *
 * All mutating calls for one plan id are serialized; different plans
 * proceed independently.
 */

import type {
  AdvancePhaseResult,
  PlanSnapshot,
  ReviewDecision,
  StartPlanInput,
} from './types.js'

// ---------------------------------------------------------------------------
// PhaseOrchestrator
// ---------------------------------------------------------------------------

/**
 * Lifecycle:
 *   startPlan() → run() (or advance() repeatedly) → complete | failed
 *   A suspended plan resumes through provideClarification(), submitReview()
 *   or overrideBlocked(), followed by run().
 */
export interface PhaseOrchestrator {
  /**
   * Validate and persist the intake of a new plan in phase 1-init.
   *
   * @returns snapshot of the created plan
   * @throws {ValidationError} if the request or context is malformed
   */
  startPlan(input: StartPlanInput): Promise<PlanSnapshot>

  /**
   * Evaluate the current phase once and apply its outcome: advance, loop
   * back, suspend or fail. A no-op for suspended or terminal plans.
   */
  advance(planId: string): Promise<AdvancePhaseResult>

  /**
   * Advance until the plan is terminal or suspended.
   *
   * @param maxSteps - safety bound on the number of advance() calls
   */
  run(planId: string, maxSteps?: number): Promise<PlanSnapshot>

  /**
   * Answer the questions of a plan waiting for clarification in 2-refine.
   * @throws {PlanStateError} if the plan is not waiting for clarification
   */
  provideClarification(planId: string, clarification: string): Promise<PlanSnapshot>

  /**
   * Decide the review gate of a plan waiting in 3-outline. Approval moves the
   * plan to 4-plan; rejection re-outlines with the feedback, or fails the plan
   * when the outline ceiling is reached.
   * @throws {PlanStateError} if the plan is not waiting for review
   */
  submitReview(planId: string, decision: ReviewDecision): Promise<PlanSnapshot>

  /**
   * Accept the currently blocked tasks so 5-execute can close.
   * @throws {PlanStateError} if the plan is not waiting on blocked tasks
   */
  overrideBlocked(planId: string, reason: string): Promise<PlanSnapshot>

  /**
   * Move a non-terminal plan to `cancelled` at the next phase boundary.
   * @throws {PlanStateError} if the plan is already terminal
   */
  cancel(planId: string, reason: string): Promise<PlanSnapshot>

  /** Current persisted state of a plan */
  getSnapshot(planId: string): Promise<PlanSnapshot>
}
