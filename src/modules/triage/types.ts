/**
 * Types for the findings/triage pipeline.
 */

import type { DecisionSource, TriageDecision } from '../../core/types.js'
import type { Finding, Task } from '../../persistence/schemas/plan-records.js'
import type { TriageResult } from '../extensions/types.js'

/**
 * Decision applied when no extension decides (or its decision is rejected).
 * Must be explicit and replaceable; the pipeline records every application.
 */
export interface TriagePolicy {
  readonly name: string
  decide(finding: Finding): TriageResult
}

export interface TriageRunOptions {
  planId: string
  /** Verify run the findings belong to; stamped on fix-tasks */
  verifyIteration: number
  /** Number of the first fix-task created */
  startTaskNumber: number
  /** Domain whose triage handler applies to a finding */
  resolveDomain: (finding: Finding) => string
  /** Executor ref for fix-tasks in a domain */
  fixExecutorFor: (domain: string) => Promise<string> | string
  /** Called once per run for each domain that falls back to the default policy */
  onFallback?: TriageFallbackListener
  now: string
}

/** One triage decision, in processing order */
export interface TriagedFinding {
  findingId: string
  domain: string
  decision: TriageDecision
  decidedBy: DecisionSource
  fixTask?: number
}

export interface TriageRunResult {
  /** All input findings; those that were `new` now carry triage records and states */
  findings: Finding[]
  /** Fix-tasks created this run, in number order */
  fixTasks: Task[]
  /** Decisions in processing order */
  decisions: TriagedFinding[]
}

/** Notified when a domain has no triage handler and the default policy applies */
export type TriageFallbackListener = (domain: string) => void
