/**
 * Core types for Planwright
 * Shared identifiers and vocabulary used across all modules
 */

/** Unique kebab-case identifier of a plan */
export type PlanId = string

/** Identifier of a technical domain (e.g. "java", "javascript") */
export type DomainId = string

/** Identifier of a finding within a plan */
export type FindingId = string

// ---------------------------------------------------------------------------
// Phases
// ---------------------------------------------------------------------------

/** The seven ordered work phases of a plan */
export const WORK_PHASES = [
  '1-init',
  '2-refine',
  '3-outline',
  '4-plan',
  '5-execute',
  '6-verify',
  '7-finalize',
] as const

export type WorkPhase = (typeof WORK_PHASES)[number]

/** Phases a plan never leaves */
export const TERMINAL_PHASES = ['complete', 'failed', 'cancelled'] as const

export type TerminalPhase = (typeof TERMINAL_PHASES)[number]

/** Every phase a plan record can carry */
export const PLAN_PHASES = [...WORK_PHASES, ...TERMINAL_PHASES] as const

export type PlanPhase = (typeof PLAN_PHASES)[number]

/** Observable status derived from phase and suspension state */
export type PlanStatus = 'running' | 'waiting' | TerminalPhase

/** Reasons a plan can be suspended waiting for an external event */
export const WAIT_REASONS = ['clarification', 'review', 'blocked-tasks'] as const

export type WaitReason = (typeof WAIT_REASONS)[number]

/** Loop counters kept per plan */
export type IterationCounter = 'refine' | 'outline' | 'verify'

// ---------------------------------------------------------------------------
// Deliverables and tasks
// ---------------------------------------------------------------------------

export const CHANGE_TYPES = ['feature', 'bug_fix', 'enhancement', 'tech_debt'] as const

export type ChangeType = (typeof CHANGE_TYPES)[number]

export const TASK_STATUSES = ['pending', 'in_progress', 'blocked', 'done'] as const

export type TaskStatus = (typeof TASK_STATUSES)[number]

export const STEP_OUTCOMES = ['pending', 'done', 'failed'] as const

export type StepOutcome = (typeof STEP_OUTCOMES)[number]

export const TASK_ORIGINS = ['normal', 'fix'] as const

export type TaskOrigin = (typeof TASK_ORIGINS)[number]

// ---------------------------------------------------------------------------
// Findings and triage
// ---------------------------------------------------------------------------

/** Severity scale, highest first */
export const SEVERITIES = ['blocker', 'critical', 'major', 'minor', 'info'] as const

export type Severity = (typeof SEVERITIES)[number]

export const TRIAGE_DECISIONS = ['FIX', 'SUPPRESS', 'ACCEPT'] as const

export type TriageDecision = (typeof TRIAGE_DECISIONS)[number]

/** Lifecycle of a finding: new → triaged → one of the resolutions, or superseded when stale */
export const FINDING_STATES = [
  'new',
  'fix-task-created',
  'suppressed',
  'accepted',
  'superseded',
] as const

export type FindingState = (typeof FINDING_STATES)[number]

/** Who produced a triage decision */
export const DECISION_SOURCES = [
  'extension',
  'default',
  'default-after-rejection',
  'handler-failure',
] as const

export type DecisionSource = (typeof DECISION_SOURCES)[number]

/**
 * Rank a severity: 0 is the most severe.
 */
export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity)
}
