/**
 * TriagePipeline interface: classifies findings FIX / SUPPRESS / ACCEPT and
 * emits coalesced fix-tasks.
 *
 * Create an instance via `createTriagePipeline()` from triage-pipeline-impl.ts.
 */

import type { Finding } from '../../persistence/schemas/plan-records.js'
import type { TriageResult } from '../extensions/types.js'
import type { TriageRunOptions, TriageRunResult } from './types.js'

export interface TriagePipeline {
  /**
   * Triage every finding in state `new`, in stable order, and create one
   * fix-task per file (or module) that received FIX decisions. Findings in
   * other states pass through unchanged.
   *
   * Never throws for a single finding: handler failures, missing handlers
   * and invalid decisions all resolve to a recorded decision.
   */
  run(findings: readonly Finding[], options: TriageRunOptions): Promise<TriageRunResult>

  /** The policy applied when no extension decides */
  defaultDecision(finding: Finding): TriageResult
}
