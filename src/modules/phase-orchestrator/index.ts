/**
 * phase-orchestrator module: Public API re-exports.
 */

// ---------------------------------------------------------------------------
// Orchestrator interface and factory
// ---------------------------------------------------------------------------

export type { PhaseOrchestrator } from './phase-orchestrator.js'
export { createPhaseOrchestrator, PhaseOrchestratorImpl, DEFAULT_EXECUTOR } from './phase-orchestrator-impl.js'
export { PlanLock } from './plan-lock.js'

// ---------------------------------------------------------------------------
// Phase machine and findings log
// ---------------------------------------------------------------------------

export {
  LOOP_BACKS,
  isTerminalPhase,
  nextPhase,
  isAllowedTransition,
  findInvalidTransitions,
  cancelPlanRecord,
  planStatus,
} from './phase-machine.js'
export {
  GENERIC_DOMAIN,
  EXTERNAL_CALL_FAILED,
  matchesRoute,
  resolveFindingDomain,
  unresolvedFindingIds,
} from './finding-log.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type {
  AnalysisResult,
  RequestAnalyzer,
  TaskExecutionInput,
  StepResult,
  TaskExecutionResult,
  TaskExecutor,
  ExecutorMap,
  CheckOutcome,
  VerificationInput,
  VerificationResult,
  Verifier,
  Finalizer,
  StartPlanInput,
  ReviewDecision,
  PlanSnapshot,
  AdvancePhaseResult,
  PhaseOrchestratorDeps,
} from './types.js'
