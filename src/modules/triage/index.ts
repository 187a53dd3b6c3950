/**
 * Findings/triage pipeline: public API
 */

export { createTriagePipeline, TriagePipelineImpl } from './triage-pipeline-impl.js'
export type { TriagePipelineOptions } from './triage-pipeline-impl.js'
export type { TriagePipeline } from './triage-pipeline.js'
export { DefaultTriagePolicy } from './default-policy.js'
export { compareFindings, sortFindings, fixTargetOf } from './ordering.js'
export type {
  TriagePolicy,
  TriageRunOptions,
  TriageRunResult,
  TriagedFinding,
  TriageFallbackListener,
} from './types.js'
