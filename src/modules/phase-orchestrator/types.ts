/**
 * Types for the Phase Orchestrator module.
 *
 * Collaborator contracts (request analyzer, task executors, verifier,
 * finalizer), orchestrator dependencies and the results it returns.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { PlanPhase, PlanStatus } from '../../core/types.js'
import type { PlanwrightConfig } from '../config/config-schema.js'
import type { ExtensionRegistry } from '../extensions/extension-registry.js'
import type { Outliner } from '../extensions/types.js'
import type { PlanStore } from '../plan-store/plan-store.js'
import type { TriagePolicy } from '../triage/types.js'
import type {
  FindingInput,
  PlanRequest,
  PlanState,
  ProjectContext,
  Task,
} from '../../persistence/schemas/plan-records.js'

// ---------------------------------------------------------------------------
// Refine: request analysis
// ---------------------------------------------------------------------------

export interface AnalysisResult {
  /** Confidence of understanding, 0-100 */
  confidence: number
  /** Domains the request touches */
  domains: string[]
  /** Questions to ask when confidence is below the threshold */
  questions: string[]
}

export interface RequestAnalyzer {
  analyze(request: PlanRequest, context: ProjectContext): Promise<AnalysisResult> | AnalysisResult
}

// ---------------------------------------------------------------------------
// Execute: task executors
// ---------------------------------------------------------------------------

export interface TaskExecutionInput {
  planId: string
  task: Readonly<Task>
}

export interface StepResult {
  /** 1-based step number */
  step: number
  outcome: 'done' | 'failed'
  diagnostic?: string
}

export interface TaskExecutionResult {
  steps: StepResult[]
  /** Findings discovered incidentally while executing */
  findings?: FindingInput[]
}

export interface TaskExecutor {
  execute(input: TaskExecutionInput): Promise<TaskExecutionResult> | TaskExecutionResult
}

/** Executor refs to executors; `default` serves refs with no entry */
export type ExecutorMap = Readonly<Record<string, TaskExecutor>>

// ---------------------------------------------------------------------------
// Verify
// ---------------------------------------------------------------------------

export type CheckOutcome = 'pass' | 'fail'

export interface VerificationInput {
  planId: string
  /** Verification run number, starting at 1 */
  iteration: number
  files: string[]
  modules: string[]
  /** Check categories to run */
  checks: string[]
}

export interface VerificationResult {
  findings: FindingInput[]
  /** Overall outcome per check category */
  checks: Record<string, CheckOutcome>
}

export interface Verifier {
  verify(input: VerificationInput): Promise<VerificationResult> | VerificationResult
}

// ---------------------------------------------------------------------------
// Finalize
// ---------------------------------------------------------------------------

export interface Finalizer {
  finalize(snapshot: PlanSnapshot): Promise<void> | void
}

// ---------------------------------------------------------------------------
// Orchestrator inputs and results
// ---------------------------------------------------------------------------

export interface StartPlanInput {
  request: { title: string; description: string; clarifications?: string[] }
  context?: {
    modules?: Array<{ name: string; domain?: string; path?: string }>
    domains?: string[]
    metadata?: Record<string, unknown>
  }
  /** Explicit id; derived from the title when omitted */
  planId?: string
}

export interface ReviewDecision {
  approved: boolean
  feedback?: string
}

/** Read-only view of a plan */
export interface PlanSnapshot extends Readonly<PlanState> {
  status: PlanStatus
}

/**
 * Result of one `advance()` call.
 */
export interface AdvancePhaseResult {
  planId: string
  /** Phase before the call */
  from: PlanPhase
  /** Phase after the call */
  phase: PlanPhase
  status: PlanStatus
  /** Whether the phase (or a self-loop) changed */
  advanced: boolean
}

export interface PhaseOrchestratorDeps {
  config: Readonly<PlanwrightConfig>
  store: PlanStore
  registry: ExtensionRegistry
  analyzer: RequestAnalyzer
  /** Outliner for domains without an `outline` extension */
  genericOutliner: Outliner
  executors: ExecutorMap
  verifier: Verifier
  finalizer?: Finalizer
  /** Defaults to DefaultTriagePolicy at `triage.fix_at_or_above` */
  triagePolicy?: TriagePolicy
  eventBus?: TypedEventBus
  /** Clock; defaults to the system clock */
  now?: () => Date
}
