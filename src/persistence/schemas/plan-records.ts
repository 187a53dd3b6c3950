/**
 * Zod schemas for persisted plan artifacts.
 *
 * Each plan is stored as five artifacts keyed by plan id: the plan record,
 * the intake (request + project context), the deliverable list, the task list
 * and the findings log. Field names are snake_case so the stored YAML reads
 * the same as the configuration files.
 */

import { z } from 'zod'
import {
  CHANGE_TYPES,
  DECISION_SOURCES,
  FINDING_STATES,
  PLAN_PHASES,
  SEVERITIES,
  STEP_OUTCOMES,
  TASK_ORIGINS,
  TASK_STATUSES,
  TRIAGE_DECISIONS,
  WAIT_REASONS,
} from '../../core/types.js'

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const PlanPhaseEnum = z.enum(PLAN_PHASES)
export const ChangeTypeEnum = z.enum(CHANGE_TYPES)
export const TaskStatusEnum = z.enum(TASK_STATUSES)
export const StepOutcomeEnum = z.enum(STEP_OUTCOMES)
export const TaskOriginEnum = z.enum(TASK_ORIGINS)
export const SeverityEnum = z.enum(SEVERITIES)
export const TriageDecisionEnum = z.enum(TRIAGE_DECISIONS)
export const FindingStateEnum = z.enum(FINDING_STATES)
export const DecisionSourceEnum = z.enum(DECISION_SOURCES)
export const WaitReasonEnum = z.enum(WAIT_REASONS)

/** Plan ids are kebab-case */
export const PlanIdSchema = z.string().regex(/^[a-z][a-z0-9-]*$/, 'plan id must be kebab-case')

// ---------------------------------------------------------------------------
// Plan record
// ---------------------------------------------------------------------------

export const PhaseHistoryEntrySchema = z.object({
  phase: PlanPhaseEnum,
  entered_at: z.string(),
  exited_at: z.string().optional(),
  reason: z.string(),
})
export type PhaseHistoryEntry = z.infer<typeof PhaseHistoryEntrySchema>

export const IterationCountersSchema = z.object({
  refine_iteration: z.number().int().min(0),
  outline_iteration: z.number().int().min(0),
  verify_iteration: z.number().int().min(0),
})
export type IterationCounters = z.infer<typeof IterationCountersSchema>

export const WaitingStateSchema = z.object({
  reason: WaitReasonEnum,
  since: z.string(),
  detail: z.array(z.string()),
})
export type WaitingState = z.infer<typeof WaitingStateSchema>

export const BlockedOverrideSchema = z.object({
  reason: z.string().min(1),
  at: z.string(),
  tasks: z.array(z.number().int().positive()),
})
export type BlockedOverride = z.infer<typeof BlockedOverrideSchema>

export const PlanFailureSchema = z.object({
  code: z.string(),
  message: z.string(),
  phase: PlanPhaseEnum,
  context: z.record(z.string(), z.unknown()),
  unresolved_findings: z.array(z.string()),
})
export type PlanFailure = z.infer<typeof PlanFailureSchema>

export const PlanCancellationSchema = z.object({
  reason: z.string(),
  at: z.string(),
  phase: PlanPhaseEnum,
})
export type PlanCancellation = z.infer<typeof PlanCancellationSchema>

export const PlanRecordSchema = z.object({
  id: PlanIdSchema,
  title: z.string().min(1),
  phase: PlanPhaseEnum,
  created_at: z.string(),
  updated_at: z.string(),
  iteration_counters: IterationCountersSchema,
  domains: z.array(z.string().min(1)),
  phase_history: z.array(PhaseHistoryEntrySchema),
  waiting: WaitingStateSchema.optional(),
  review_feedback: z.array(z.string()),
  blocked_overrides: z.array(BlockedOverrideSchema),
  failure: PlanFailureSchema.optional(),
  cancellation: PlanCancellationSchema.optional(),
  /** Commit counter; the store bumps it on every commit of the plan */
  revision: z.number().int().min(0).default(0),
})
export type PlanRecord = z.infer<typeof PlanRecordSchema>

// ---------------------------------------------------------------------------
// Intake (request + project context)
// ---------------------------------------------------------------------------

export const PlanRequestSchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  clarifications: z.array(z.string()).default([]),
})
export type PlanRequest = z.infer<typeof PlanRequestSchema>

export const ModuleInfoSchema = z.object({
  name: z.string().min(1),
  domain: z.string().min(1).optional(),
  path: z.string().optional(),
})
export type ModuleInfo = z.infer<typeof ModuleInfoSchema>

export const ProjectContextSchema = z.object({
  modules: z.array(ModuleInfoSchema).default([]),
  domains: z.array(z.string().min(1)).default([]),
  metadata: z.record(z.string(), z.unknown()).optional(),
})
export type ProjectContext = z.infer<typeof ProjectContextSchema>

export const RequestAnalysisSchema = z.object({
  confidence: z.number().min(0).max(100),
  domains: z.array(z.string().min(1)),
  questions: z.array(z.string()),
  analyzed_at: z.string(),
})
export type RequestAnalysis = z.infer<typeof RequestAnalysisSchema>

export const IntakeRecordSchema = z.object({
  request: PlanRequestSchema,
  context: ProjectContextSchema,
  analysis: RequestAnalysisSchema.optional(),
})
export type IntakeRecord = z.infer<typeof IntakeRecordSchema>

// ---------------------------------------------------------------------------
// Deliverables
// ---------------------------------------------------------------------------

/**
 * Deliverable as returned by an outliner. `key` is the outliner's own
 * identifier, referenced by `depends_on`; numbering happens after ordering.
 */
export const DeliverableDraftSchema = z.object({
  key: z.string().min(1),
  title: z.string().min(1),
  description: z.string().default(''),
  change_type: ChangeTypeEnum,
  domain: z.string().min(1).optional(),
  module: z.string().min(1),
  affected_files: z.array(z.string().min(1)).default([]),
  profiles: z.array(z.string().min(1)).min(1).optional(),
  skills: z.array(z.string()).default([]),
  depends_on: z.array(z.string().min(1)).default([]),
})
/** What an outliner returns (defaults not yet applied) */
export type DeliverableDraftInput = z.input<typeof DeliverableDraftSchema>
export type DeliverableDraft = z.infer<typeof DeliverableDraftSchema>

export const DeliverableSchema = z.object({
  number: z.number().int().positive(),
  title: z.string().min(1),
  description: z.string(),
  change_type: ChangeTypeEnum,
  domain: z.string().min(1),
  module: z.string().min(1),
  affected_files: z.array(z.string().min(1)),
  profiles: z.array(z.string().min(1)).min(1),
  skills: z.array(z.string()),
  depends_on: z.array(z.number().int().positive()),
})
export type Deliverable = z.infer<typeof DeliverableSchema>

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

export const TaskStepSchema = z.object({
  number: z.number().int().positive(),
  target: z.string().min(1),
  outcome: StepOutcomeEnum,
  diagnostic: z.string().optional(),
})
export type TaskStep = z.infer<typeof TaskStepSchema>

export const TaskSchema = z.object({
  number: z.number().int().positive(),
  title: z.string().min(1),
  /** Parent deliverable number; null for fix-tasks */
  deliverable: z.number().int().positive().nullable(),
  origin: TaskOriginEnum,
  /** Findings a fix-task addresses */
  finding_ids: z.array(z.string()),
  status: TaskStatusEnum,
  profile: z.string().min(1),
  domain: z.string().min(1),
  module: z.string().min(1),
  executor: z.string().min(1),
  skills: z.array(z.string()),
  steps: z.array(TaskStepSchema).min(1),
  depends_on: z.array(z.number().int().positive()),
  /** Verify run that produced a fix-task */
  verify_iteration: z.number().int().positive().optional(),
  blocked_reason: z.string().optional(),
  created_at: z.string(),
  updated_at: z.string(),
})
export type Task = z.infer<typeof TaskSchema>

// ---------------------------------------------------------------------------
// Findings
// ---------------------------------------------------------------------------

/** A finding as reported by a verifier or executor */
export const FindingInputSchema = z.object({
  id: z.string().min(1).optional(),
  source: z.string().min(1),
  rule: z.string().min(1),
  file: z.string().min(1).optional(),
  line: z.number().int().positive().optional(),
  module: z.string().min(1).optional(),
  severity: SeverityEnum,
  message: z.string().min(1),
  auto_fixable: z.boolean().default(false),
  domain: z.string().min(1).optional(),
})
export type FindingInput = z.input<typeof FindingInputSchema>
export type ParsedFindingInput = z.infer<typeof FindingInputSchema>

export const TriageRecordSchema = z.object({
  decision: TriageDecisionEnum,
  rationale: z.string().optional(),
  decided_by: DecisionSourceEnum,
  /** Why an extension's decision was rejected, when it was */
  rejected: z.string().optional(),
})
export type TriageRecord = z.infer<typeof TriageRecordSchema>

export const FindingSchema = z.object({
  id: z.string().min(1),
  source: z.string().min(1),
  rule: z.string().min(1),
  file: z.string().min(1).optional(),
  line: z.number().int().positive().optional(),
  module: z.string().min(1).optional(),
  severity: SeverityEnum,
  message: z.string().min(1),
  auto_fixable: z.boolean(),
  domain: z.string().min(1).optional(),
  /** Verify run the finding belongs to (0 = raised during execute before any verify run) */
  verify_iteration: z.number().int().min(0),
  state: FindingStateEnum,
  triage: TriageRecordSchema.optional(),
  fix_task: z.number().int().positive().optional(),
  recorded_at: z.string(),
})
export type Finding = z.infer<typeof FindingSchema>

// ---------------------------------------------------------------------------
// Aggregate plan state
// ---------------------------------------------------------------------------

export const PlanStateSchema = z.object({
  plan: PlanRecordSchema,
  intake: IntakeRecordSchema,
  deliverables: z.array(DeliverableSchema),
  tasks: z.array(TaskSchema),
  findings: z.array(FindingSchema),
})
export type PlanState = z.infer<typeof PlanStateSchema>

/** Names of the independently stored artifacts of a plan */
export const PLAN_ARTIFACTS = ['plan', 'intake', 'deliverables', 'tasks', 'findings'] as const
export type PlanArtifact = (typeof PLAN_ARTIFACTS)[number]

/** Schema per artifact, used when loading stored documents */
export const ARTIFACT_SCHEMAS = {
  plan: PlanRecordSchema,
  intake: IntakeRecordSchema,
  deliverables: z.array(DeliverableSchema),
  tasks: z.array(TaskSchema),
  findings: z.array(FindingSchema),
} as const satisfies Record<PlanArtifact, z.ZodTypeAny>
