/**
 * Capability contracts for domain extensions.
 *
 * Each capability is a typed interface; the registry maps
 * (domain, capability) to an implementation. Methods may be sync or async;
 * the orchestrator always awaits them under a timeout.
 */

import type { ChangeType, TriageDecision } from '../../core/types.js'
import type {
  DeliverableDraftInput,
  Finding,
  PlanRequest,
  ProjectContext,
} from '../../persistence/schemas/plan-records.js'

// ---------------------------------------------------------------------------
// outline
// ---------------------------------------------------------------------------

export interface OutlineInput {
  planId: string
  /** Domain the outliner is invoked for */
  domain: string
  /**
   * Every domain this call covers. The generic outliner is called once for
   * all domains without an outline extension; `domain` is the first of them.
   */
  domains: readonly string[]
  request: PlanRequest
  context: ProjectContext
  /** Review feedback from rejected earlier outlines, oldest first */
  feedback: readonly string[]
}

/** Turns a request into deliverable drafts */
export interface Outliner {
  outline(input: OutlineInput): Promise<DeliverableDraftInput[]> | DeliverableDraftInput[]
}

// ---------------------------------------------------------------------------
// triage
// ---------------------------------------------------------------------------

export interface TriageResult {
  decision: TriageDecision
  /** Required for SUPPRESS */
  rationale?: string
}

/** Classifies a single finding */
export interface Triager {
  triage(finding: Finding): Promise<TriageResult> | TriageResult
}

// ---------------------------------------------------------------------------
// change_type_agent
// ---------------------------------------------------------------------------

/** Maps a change type to the executor that performs the work */
export interface ChangeTypeAgent {
  executorFor(changeType: ChangeType): Promise<string> | string
}

// ---------------------------------------------------------------------------
// Registry vocabulary
// ---------------------------------------------------------------------------

/** Handler interface per capability */
export interface CapabilityHandlers {
  outline: Outliner
  triage: Triager
  change_type_agent: ChangeTypeAgent
}

export type Capability = keyof CapabilityHandlers

export const CAPABILITIES: readonly Capability[] = ['outline', 'triage', 'change_type_agent']

/** Static configuration map: domain → the capabilities it provides */
export type ExtensionMap = Record<string, Partial<CapabilityHandlers>>
