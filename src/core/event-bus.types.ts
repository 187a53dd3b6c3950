/**
 * PlanEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {entity}:{action} (e.g., "plan:created", "task:status-changed")
 * Payloads carry identifiers and the minimum data a subscriber needs; full
 * records are read from the plan store.
 */

import type {
  FindingId,
  PlanId,
  PlanPhase,
  Severity,
  TaskStatus,
  TriageDecision,
  WaitReason,
  DecisionSource,
} from './types.js'

// ---------------------------------------------------------------------------
// PlanEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted on the plan event bus.
 * Use `keyof PlanEvents` to constrain event keys.
 */
export interface PlanEvents {
  // -------------------------------------------------------------------------
  // Plan lifecycle events
  // -------------------------------------------------------------------------

  /** Intake artifacts were persisted for a new plan */
  'plan:created': { planId: PlanId; title: string }

  /** The plan moved between phases (including self-loops) */
  'plan:phase-changed': {
    planId: PlanId
    from: PlanPhase
    to: PlanPhase
    reason: string
  }

  /** The plan is waiting for an external event */
  'plan:suspended': { planId: PlanId; phase: PlanPhase; reason: WaitReason; detail: string[] }

  /** A waiting plan received its external event */
  'plan:resumed': { planId: PlanId; phase: PlanPhase; reason: WaitReason }

  /** The plan reached the terminal failed state */
  'plan:failed': {
    planId: PlanId
    phase: PlanPhase
    code: string
    message: string
    unresolvedFindings: FindingId[]
  }

  /** The plan reached the terminal complete state */
  'plan:completed': { planId: PlanId; verifyIterations: number }

  /** The plan was cancelled */
  'plan:cancelled': { planId: PlanId; phase: PlanPhase; reason: string }

  // -------------------------------------------------------------------------
  // Task events
  // -------------------------------------------------------------------------

  /** A task was added to the plan's task list */
  'task:created': { planId: PlanId; taskNumber: number; origin: 'normal' | 'fix'; title: string }

  /** A task's status changed */
  'task:status-changed': {
    planId: PlanId
    taskNumber: number
    from: TaskStatus
    to: TaskStatus
  }

  // -------------------------------------------------------------------------
  // Finding events
  // -------------------------------------------------------------------------

  /** A finding was appended to the findings log */
  'finding:recorded': {
    planId: PlanId
    findingId: FindingId
    source: string
    severity: Severity
  }

  /** A finding received its triage decision */
  'finding:triaged': {
    planId: PlanId
    findingId: FindingId
    decision: TriageDecision
    decidedBy: DecisionSource
    fixTask?: number
  }

  // -------------------------------------------------------------------------
  // Extension events
  // -------------------------------------------------------------------------

  /** A capability had no handler for a domain and the generic behavior was used */
  'extension:fallback': { planId: PlanId; domain: string; capability: string }
}
