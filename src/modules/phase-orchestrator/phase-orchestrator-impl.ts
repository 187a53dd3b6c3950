/**
 * PhaseOrchestrator implementation.
 *
 * Factory: createPhaseOrchestrator(deps) → PhaseOrchestrator
 *
 * Each operation loads the plan inside the plan's lock, evaluates the
 * current phase into a PhaseOutcome (advance / loop / suspend / fail),
 * applies it through the phase machine and commits the changed artifacts.
 * Unit-level failures (an executor call, a single finding) are recorded as
 * data; structural errors abort the phase and fail the plan.
 */

import { z } from 'zod'
import {
  ExecutionFailureError,
  IterationLimitExceededError,
  PlanConflictError,
  PlanStateError,
  PlanwrightError,
  TransientError,
  ValidationError,
  isStructuralError,
} from '../../core/errors.js'
import type { ChangeType, IterationCounter, PlanPhase, TaskStatus, WaitReason, WorkPhase } from '../../core/types.js'
import type { PlanwrightConfig } from '../config/config-schema.js'
import type { ExtensionRegistry } from '../extensions/extension-registry.js'
import { invokeExternal } from '../extensions/external-call.js'
import type { ExternalCallResult } from '../extensions/external-call.js'
import type { Outliner } from '../extensions/types.js'
import type { PlanStore } from '../plan-store/plan-store.js'
import { checkReferentialIntegrity } from '../task-model/integrity.js'
import { prepareDeliverables } from '../task-model/deliverables.js'
import { deriveTasks } from '../task-model/task-deriver.js'
import {
  blockDependents,
  blockTask,
  isExecutionSettled,
  isTaskSettled,
  nextTaskNumber,
  readyTasks,
  recordStepOutcome,
  setTaskStatus,
} from '../task-model/task-tracker.js'
import { DefaultTriagePolicy } from '../triage/default-policy.js'
import { createTriagePipeline } from '../triage/triage-pipeline-impl.js'
import type { TriagePipeline } from '../triage/triage-pipeline.js'
import {
  FindingInputSchema,
  IntakeRecordSchema,
  PlanIdSchema,
} from '../../persistence/schemas/plan-records.js'
import type {
  Finding,
  ParsedFindingInput,
  PlanRecord,
  PlanState,
  ProjectContext,
  Task,
} from '../../persistence/schemas/plan-records.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { createLogger, childLogger } from '../../utils/logger.js'
import { isPlainObject, toKebabCase } from '../../utils/helpers.js'
import {
  EXTERNAL_CALL_FAILED,
  GENERIC_DOMAIN,
  appendFindings,
  resolveFindingDomain,
  supersedeFindings,
  unresolvedFindingIds,
} from './finding-log.js'
import {
  LOOP_BACKS,
  applyTransition,
  cancelPlanRecord,
  canLoop,
  countLoop,
  isTerminalPhase,
  loopsTaken,
  maxIterationsFor,
  nextPhase,
  planStatus,
} from './phase-machine.js'
import type { PhaseOrchestrator } from './phase-orchestrator.js'
import { PlanLock } from './plan-lock.js'
import { PlanSession } from './plan-session.js'
import type {
  AdvancePhaseResult,
  ExecutorMap,
  Finalizer,
  PhaseOrchestratorDeps,
  PlanSnapshot,
  RequestAnalyzer,
  ReviewDecision,
  StartPlanInput,
  TaskExecutionResult,
  TaskExecutor,
  Verifier,
} from './types.js'

const logger = createLogger('orchestrator')

/** Executor ref used when neither an extension nor the config names one */
export const DEFAULT_EXECUTOR = 'default'

const DEFAULT_MAX_STEPS = 1_000

/** Lock key for plan creation; not a valid plan id */
const CREATE_LOCK_KEY = ':create'

// ---------------------------------------------------------------------------
// Result schemas for external collaborators
// ---------------------------------------------------------------------------

const AnalysisResultSchema = z.object({
  confidence: z.number().min(0).max(100),
  domains: z.array(z.string().min(1)),
  questions: z.array(z.string()),
})

const TaskExecutionResultSchema = z.object({
  steps: z.array(
    z.object({
      step: z.number().int().positive(),
      outcome: z.enum(['done', 'failed']),
      diagnostic: z.string().optional(),
    }),
  ),
  findings: z.array(FindingInputSchema).default([]),
})

const VerificationResultSchema = z.object({
  findings: z.array(FindingInputSchema),
  checks: z.record(z.string(), z.enum(['pass', 'fail'])),
})

function issuesOf(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ')
}

// ---------------------------------------------------------------------------
// Phase outcomes
// ---------------------------------------------------------------------------

interface Suspension {
  reason: WaitReason
  detail: string[]
}

type PhaseOutcome =
  | { kind: 'advance'; reason: string }
  | { kind: 'loop'; counter: IterationCounter; reason: string; suspend?: Suspension }
  | { kind: 'suspend'; suspension: Suspension }
  | { kind: 'fail'; error: PlanwrightError }

/** Errors that abort the current phase and fail the plan */
function abortsPhase(err: unknown): err is PlanwrightError {
  return isStructuralError(err) || err instanceof ExecutionFailureError
}

function toSnapshot(state: PlanState): PlanSnapshot {
  return { ...state, status: planStatus(state.plan) }
}

function uniqueNonEmpty(values: readonly (string | undefined)[]): string[] {
  return [...new Set(values.filter((v): v is string => v !== undefined && v !== ''))]
}

/** Plan domains: the analyzer's, else the context's, else its modules', else `generic` */
function resolvePlanDomains(analyzed: readonly string[], context: ProjectContext): string[] {
  for (const candidate of [analyzed, context.domains, context.modules.map((m) => m.domain)]) {
    const domains = uniqueNonEmpty(candidate)
    if (domains.length > 0) return domains
  }
  return [GENERIC_DOMAIN]
}

// ---------------------------------------------------------------------------
// PhaseOrchestratorImpl
// ---------------------------------------------------------------------------

export class PhaseOrchestratorImpl implements PhaseOrchestrator {
  private readonly _config: Readonly<PlanwrightConfig>
  private readonly _store: PlanStore
  private readonly _registry: ExtensionRegistry
  private readonly _analyzer: RequestAnalyzer
  private readonly _genericOutliner: Outliner
  private readonly _executors: ExecutorMap
  private readonly _verifier: Verifier
  private readonly _finalizer: Finalizer | undefined
  private readonly _triage: TriagePipeline
  private readonly _bus: TypedEventBus | undefined
  private readonly _clock: () => Date
  private readonly _lock = new PlanLock()

  constructor(deps: PhaseOrchestratorDeps) {
    this._config = deps.config
    this._store = deps.store
    this._registry = deps.registry
    this._analyzer = deps.analyzer
    this._genericOutliner = deps.genericOutliner
    this._executors = deps.executors
    this._verifier = deps.verifier
    this._finalizer = deps.finalizer
    this._bus = deps.eventBus
    this._clock = deps.now ?? (() => new Date())
    this._triage = createTriagePipeline({
      registry: deps.registry,
      policy: deps.triagePolicy ?? new DefaultTriagePolicy(deps.config.triage.fix_at_or_above),
      timeoutMs: deps.config.extensions.timeout_ms,
    })
  }

  // -------------------------------------------------------------------------
  // startPlan
  // -------------------------------------------------------------------------

  async startPlan(input: StartPlanInput): Promise<PlanSnapshot> {
    const parsed = IntakeRecordSchema.safeParse({ request: input.request, context: input.context ?? {} })
    if (!parsed.success) {
      throw new ValidationError(`Malformed plan request: ${issuesOf(parsed.error)}`)
    }
    const intake = parsed.data

    if (input.planId !== undefined && !PlanIdSchema.safeParse(input.planId).success) {
      throw new ValidationError(`Invalid plan id "${input.planId}": must be kebab-case`, { planId: input.planId })
    }

    return this._lock.run(CREATE_LOCK_KEY, async () => {
      const planId = input.planId ?? (await this._freePlanId(toKebabCase(intake.request.title)))
      const now = this._now()
      const state: PlanState = {
        plan: {
          id: planId,
          title: intake.request.title,
          phase: '1-init',
          created_at: now,
          updated_at: now,
          iteration_counters: { refine_iteration: 0, outline_iteration: 0, verify_iteration: 0 },
          domains: [],
          phase_history: [{ phase: '1-init', entered_at: now, reason: 'plan created' }],
          review_feedback: [],
          blocked_overrides: [],
          revision: 0,
        },
        intake,
        deliverables: [],
        tasks: [],
        findings: [],
      }

      await this._store.create(state)
      logger.info({ planId, title: state.plan.title }, 'Plan created')
      this._bus?.emit('plan:created', { planId, title: state.plan.title })
      return toSnapshot(state)
    })
  }

  // -------------------------------------------------------------------------
  // advance / run
  // -------------------------------------------------------------------------

  advance(planId: string): Promise<AdvancePhaseResult> {
    return this._lock.run(planId, () => this._advanceLocked(planId))
  }

  async run(planId: string, maxSteps: number = DEFAULT_MAX_STEPS): Promise<PlanSnapshot> {
    for (let step = 0; step < maxSteps; step++) {
      const result = await this.advance(planId)
      if (result.status !== 'running') return this.getSnapshot(planId)
      if (!result.advanced) {
        throw new PlanStateError(`Plan ${planId} made no progress in phase ${result.phase}`, { planId })
      }
    }
    throw new PlanStateError(`Plan ${planId} did not settle within ${String(maxSteps)} steps`, { planId, maxSteps })
  }

  private async _advanceLocked(planId: string): Promise<AdvancePhaseResult> {
    const session = await this._open(planId)
    const before = session.state.plan
    const from = before.phase

    if (isTerminalPhase(from) || before.waiting !== undefined) {
      return { planId, from, phase: from, status: planStatus(before), advanced: false }
    }

    try {
      await this._step(session, from)
    } catch (err) {
      if (!(err instanceof PlanConflictError)) throw err
      const stored = await this._settledElsewhere(session, err)
      return { planId, from, phase: stored.phase, status: planStatus(stored), advanced: false }
    }

    const after = session.state.plan
    return {
      planId,
      from,
      phase: after.phase,
      status: planStatus(after),
      advanced: after.phase_history.length !== before.phase_history.length,
    }
  }

  /** Evaluate one phase, apply its outcome and commit */
  private async _step(session: PlanSession, from: WorkPhase): Promise<void> {
    let outcome: PhaseOutcome
    try {
      outcome = await this._runPhase(session, from)
    } catch (err) {
      if (!abortsPhase(err)) throw err
      outcome = { kind: 'fail', error: err }
    }
    this._applyOutcome(session, from, outcome)
    await session.commit(this._store)
  }

  /**
   * Another process committed the plan during this step. A plan it settled
   * (cancelled, typically) wins and the step's work is dropped; any other
   * concurrent write is an error.
   */
  private async _settledElsewhere(session: PlanSession, conflict: PlanConflictError): Promise<PlanRecord> {
    const { plan } = await this._store.load(session.planId)
    if (!isTerminalPhase(plan.phase)) throw conflict
    session.log.warn({ phase: plan.phase, revision: plan.revision }, 'Plan settled by another writer; step discarded')
    return plan
  }

  private _runPhase(session: PlanSession, phase: WorkPhase): Promise<PhaseOutcome> {
    switch (phase) {
      case '1-init':
        return Promise.resolve({ kind: 'advance', reason: 'intake persisted' })
      case '2-refine':
        return this._refine(session)
      case '3-outline':
        return this._outline(session)
      case '4-plan':
        return this._plan(session)
      case '5-execute':
        return this._execute(session)
      case '6-verify':
        return this._verify(session)
      case '7-finalize':
        return this._finalize(session)
    }
  }

  // -------------------------------------------------------------------------
  // 2-refine
  // -------------------------------------------------------------------------

  private async _refine(session: PlanSession): Promise<PhaseOutcome> {
    const { request, context } = session.state.intake
    const threshold = this._config.plan.refine.confidence_threshold

    const call = await invokeExternal('analyze', () => this._analyzer.analyze(request, context), this._callOptions(session))
    if (!call.ok) {
      this._recordBlocking(session, 'refine', call.error)
      return {
        kind: 'loop',
        counter: 'refine',
        reason: 'request analysis failed',
        suspend: { reason: 'clarification', detail: [call.error.message] },
      }
    }

    const parsed = AnalysisResultSchema.safeParse(call.value)
    if (!parsed.success) {
      throw new ValidationError(`Request analyzer returned a malformed result: ${issuesOf(parsed.error)}`)
    }
    const analysis = parsed.data

    session.state.intake = { ...session.state.intake, analysis: { ...analysis, analyzed_at: session.now } }
    session.state.plan = {
      ...session.state.plan,
      domains: resolvePlanDomains(analysis.domains, context),
      updated_at: session.now,
    }
    this._supersede(session, (f) => f.source === 'refine')

    if (analysis.confidence >= threshold) {
      return {
        kind: 'advance',
        reason: `confidence ${String(analysis.confidence)} meets threshold ${String(threshold)}`,
      }
    }
    const reason = `confidence ${String(analysis.confidence)} below threshold ${String(threshold)}`
    return {
      kind: 'loop',
      counter: 'refine',
      reason,
      suspend: { reason: 'clarification', detail: analysis.questions.length > 0 ? analysis.questions : [reason] },
    }
  }

  // -------------------------------------------------------------------------
  // 3-outline
  // -------------------------------------------------------------------------

  private async _outline(session: PlanSession): Promise<PhaseOutcome> {
    const { plan, intake } = session.state
    const drafts: unknown[] = []
    const failures: string[] = []

    for (const { outliner, domains } of this._outlineCalls(session)) {
      const [domain = GENERIC_DOMAIN] = domains
      const call = await invokeExternal(
        `outline:${domains.join(',')}`,
        () =>
          outliner.outline({
            planId: plan.id,
            domain,
            domains,
            request: intake.request,
            context: intake.context,
            feedback: plan.review_feedback,
          }),
        this._callOptions(session),
      )
      if (!call.ok) {
        this._recordBlocking(session, 'outline', call.error, { domain })
        failures.push(call.error.message)
        continue
      }

      const value: unknown = call.value
      if (!Array.isArray(value)) {
        throw new ValidationError(`Outliner for domain '${domain}' did not return a list of deliverables`, { domain })
      }
      const items: readonly unknown[] = value
      for (const item of items) {
        drafts.push(isPlainObject(item) && item['domain'] === undefined ? { ...item, domain } : item)
      }
    }

    if (failures.length > 0) {
      throw new ExecutionFailureError(`Outline failed for ${String(failures.length)} domain(s)`, { failures })
    }

    const deliverables = prepareDeliverables(drafts, {
      defaultDomain: plan.domains[0] ?? GENERIC_DOMAIN,
      defaultProfiles: this._config.plan.plan.profiles,
    })
    session.state.deliverables = deliverables
    this._supersede(session, (f) => f.source === 'outline')
    session.log.info({ deliverables: deliverables.length }, 'Outline produced')

    if (this._config.plan.outline.require_review) {
      return {
        kind: 'suspend',
        suspension: { reason: 'review', detail: deliverables.map((d) => `${String(d.number)}. ${d.title}`) },
      }
    }
    return { kind: 'advance', reason: `${String(deliverables.length)} deliverables outlined` }
  }

  /**
   * One call per domain with an outline extension, plus a single generic
   * call for all the others, placed where the first of them appears.
   */
  private _outlineCalls(session: PlanSession): Array<{ outliner: Outliner; domains: string[] }> {
    const calls: Array<{ outliner: Outliner; domains: string[] }> = []
    let generic: { outliner: Outliner; domains: string[] } | undefined
    for (const domain of session.state.plan.domains) {
      const outliner = this._registry.tryResolve(domain, 'outline')
      if (outliner !== undefined) {
        calls.push({ outliner, domains: [domain] })
        continue
      }
      this._reportFallback(session, domain, 'outline')
      if (generic === undefined) {
        generic = { outliner: this._genericOutliner, domains: [] }
        calls.push(generic)
      }
      generic.domains.push(domain)
    }
    return calls
  }

  // -------------------------------------------------------------------------
  // 4-plan
  // -------------------------------------------------------------------------

  private async _plan(session: PlanSession): Promise<PhaseOutcome> {
    const { deliverables } = session.state
    if (deliverables.length === 0) {
      throw new ValidationError('No deliverables to plan')
    }

    const implementationExecutors = new Map<number, string>()
    for (const deliverable of deliverables) {
      const executor = await this._changeTypeExecutor(session, deliverable.domain, deliverable.change_type, {
        recordFailure: true,
        module: deliverable.module,
      })
      if (executor !== undefined) implementationExecutors.set(deliverable.number, executor)
    }

    const tasks = deriveTasks(deliverables, {
      profileOrder: this._config.plan.plan.profiles,
      executorFor: (deliverable, profile) =>
        (profile === 'implementation' ? implementationExecutors.get(deliverable.number) : undefined) ??
        this._profileExecutor(profile),
      startNumber: nextTaskNumber(session.state.tasks),
      now: session.now,
    })
    session.state.tasks = [...session.state.tasks, ...tasks]
    this._assertIntegrity(session)

    for (const task of tasks) {
      session.emit('task:created', { planId: session.planId, taskNumber: task.number, origin: task.origin, title: task.title })
    }
    return { kind: 'advance', reason: `${String(tasks.length)} tasks derived` }
  }

  /**
   * Executor named by the domain's change_type_agent, or undefined when the
   * domain has none or its call fails.
   */
  private async _changeTypeExecutor(
    session: PlanSession,
    domain: string,
    changeType: ChangeType,
    options: { recordFailure: boolean; module?: string },
  ): Promise<string | undefined> {
    const agent = this._registry.tryResolve(domain, 'change_type_agent')
    if (agent === undefined) {
      this._reportFallback(session, domain, 'change_type_agent')
      return undefined
    }

    const call = await invokeExternal(
      `change_type_agent:${domain}`,
      () => agent.executorFor(changeType),
      this._callOptions(session),
    )
    if (!call.ok) {
      if (options.recordFailure) this._recordBlocking(session, 'plan', call.error, { domain, module: options.module })
      return undefined
    }
    const executor: unknown = call.value
    return typeof executor === 'string' && executor !== '' ? executor : undefined
  }

  private _profileExecutor(profile: string): string {
    const executors: Readonly<Record<string, string | undefined>> = this._config.plan.execute.task_executors
    return executors[profile] ?? DEFAULT_EXECUTOR
  }

  // -------------------------------------------------------------------------
  // 5-execute
  // -------------------------------------------------------------------------

  private async _execute(session: PlanSession): Promise<PhaseOutcome> {
    const maxConcurrency = this._config.plan.execute.max_concurrency

    for (;;) {
      this._propagateBlocked(session)
      const batch = readyTasks(session.state.tasks).slice(0, maxConcurrency)
      if (batch.length === 0) break

      for (const task of batch) this._setTaskStatus(session, task.number, 'in_progress')
      const results = await Promise.all(
        batch.map(async (task) => ({ task, call: await this._invokeExecutor(session, task) })),
      )
      for (const { task, call } of results) this._applyExecution(session, task, call)

      // Checkpoint: every batch is committed as a consistent set of artifacts
      await session.commit(this._store)
    }

    const { tasks, plan } = session.state
    if (!isExecutionSettled(tasks)) {
      const stuck = tasks.filter((t) => !isTaskSettled(t)).map((t) => t.number)
      throw new ValidationError(`Tasks can never run: ${stuck.map((n) => `TASK-${String(n)}`).join(', ')}`, { stuck })
    }

    const overridden = new Set(plan.blocked_overrides.flatMap((o) => o.tasks))
    const blocked = tasks.filter((t) => t.status === 'blocked' && !overridden.has(t.number))
    if (blocked.length > 0) {
      return {
        kind: 'suspend',
        suspension: {
          reason: 'blocked-tasks',
          detail: blocked.map((t) => `TASK-${String(t.number)}: ${t.blocked_reason ?? 'blocked'}`),
        },
      }
    }

    const done = tasks.filter((t) => t.status === 'done').length
    return { kind: 'advance', reason: `${String(done)} of ${String(tasks.length)} tasks done` }
  }

  private _invokeExecutor(session: PlanSession, task: Task): Promise<ExternalCallResult<TaskExecutionResult>> {
    const executor: TaskExecutor | undefined = this._executors[task.executor] ?? this._executors[DEFAULT_EXECUTOR]
    if (executor === undefined) {
      return Promise.resolve({
        ok: false,
        error: new TransientError(`No executor registered for '${task.executor}'`, { executor: task.executor }),
        attempts: 0,
      })
    }
    return invokeExternal(
      `execute:TASK-${String(task.number)}`,
      () => executor.execute({ planId: session.planId, task }),
      this._callOptions(session),
    )
  }

  private _applyExecution(
    session: PlanSession,
    task: Task,
    call: ExternalCallResult<TaskExecutionResult>,
  ): void {
    if (!call.ok) {
      this._blockWithFinding(session, task, call.error)
      return
    }
    const parsed = TaskExecutionResultSchema.safeParse(call.value)
    if (!parsed.success) {
      this._blockWithFinding(
        session,
        task,
        new TransientError(`Executor '${task.executor}' returned a malformed result: ${issuesOf(parsed.error)}`),
      )
      return
    }

    let tasks = session.state.tasks
    try {
      for (const step of [...parsed.data.steps].sort((a, b) => a.step - b.step)) {
        const options = step.diagnostic !== undefined ? { diagnostic: step.diagnostic, now: session.now } : { now: session.now }
        tasks = recordStepOutcome(tasks, task.number, step.step, step.outcome, options)
      }
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err
      this._blockWithFinding(session, task, err)
      return
    }

    const updated = tasks.find((t) => t.number === task.number)
    if (updated !== undefined && !isTaskSettled(updated)) {
      const missing = updated.steps.filter((s) => s.outcome === 'pending').map((s) => s.number)
      tasks = blockTask(tasks, task.number, `steps not reported: ${missing.join(', ')}`, session.now)
    }
    session.state.tasks = tasks
    this._emitStatus(session, task.number, 'in_progress')

    this._recordFindings(session, parsed.data.findings, { domain: task.domain })
  }

  private _blockWithFinding(session: PlanSession, task: Task, error: PlanwrightError): void {
    session.state.tasks = blockTask(session.state.tasks, task.number, error.message, session.now)
    this._emitStatus(session, task.number, 'in_progress')
    this._recordBlocking(session, 'execute', error, { domain: task.domain, module: task.module })
  }

  private _propagateBlocked(session: PlanSession): void {
    const { tasks, blocked } = blockDependents(session.state.tasks, session.now)
    session.state.tasks = tasks
    for (const taskNumber of blocked) this._emitStatus(session, taskNumber, 'pending')
  }

  private _setTaskStatus(session: PlanSession, taskNumber: number, status: TaskStatus): void {
    const from = session.state.tasks.find((t) => t.number === taskNumber)?.status
    session.state.tasks = setTaskStatus(session.state.tasks, taskNumber, status, session.now)
    if (from !== undefined) this._emitStatus(session, taskNumber, from)
  }

  private _emitStatus(session: PlanSession, taskNumber: number, from: TaskStatus): void {
    const to = session.state.tasks.find((t) => t.number === taskNumber)?.status
    if (to !== undefined && to !== from) {
      session.emit('task:status-changed', { planId: session.planId, taskNumber, from, to })
    }
  }

  // -------------------------------------------------------------------------
  // 6-verify
  // -------------------------------------------------------------------------

  private async _verify(session: PlanSession): Promise<PhaseOutcome> {
    const plan = session.state.plan
    const iteration = plan.iteration_counters.verify_iteration + 1
    session.state.plan = {
      ...plan,
      iteration_counters: { ...plan.iteration_counters, verify_iteration: iteration },
      updated_at: session.now,
    }
    // Findings left untriaged by an earlier run are stale
    this._supersede(session, (f) => f.verify_iteration < iteration)

    const input = {
      planId: session.planId,
      iteration,
      files: this._touchedFiles(session.state),
      modules: uniqueNonEmpty(session.state.tasks.map((t) => t.module)).sort(),
      checks: [...this._config.plan.verify.checks],
    }
    const call = await invokeExternal('verify', () => this._verifier.verify(input), this._callOptions(session))
    if (!call.ok) {
      this._recordBlocking(session, 'verify', call.error)
    } else {
      const parsed = VerificationResultSchema.safeParse(call.value)
      if (!parsed.success) {
        throw new ValidationError(`Verifier returned a malformed result: ${issuesOf(parsed.error)}`)
      }
      const added = this._recordFindings(session, parsed.data.findings, {})
      const failedChecks = Object.entries(parsed.data.checks)
        .filter(([category, outcome]) => outcome === 'fail' && !added.some((f) => f.source === category))
        .map(([category]) => category)
        .sort()
      this._recordFindings(
        session,
        failedChecks.map((category) => ({
          source: category,
          rule: `check-failed:${category}`,
          severity: 'blocker',
          message: `Check '${category}' failed without reporting findings`,
          auto_fixable: false,
        })),
        {},
      )
    }

    const result = await this._triage.run(session.state.findings, {
      planId: session.planId,
      verifyIteration: iteration,
      startTaskNumber: nextTaskNumber(session.state.tasks),
      resolveDomain: (finding) =>
        resolveFindingDomain(finding, this._config.triage.domain_routes, session.state.plan.domains),
      fixExecutorFor: async (domain) =>
        (await this._changeTypeExecutor(session, domain, 'bug_fix', { recordFailure: false })) ??
        this._profileExecutor('implementation'),
      onFallback: (domain) => this._reportFallback(session, domain, 'triage', false),
      now: session.now,
    })

    session.state.findings = result.findings
    session.state.tasks = [...session.state.tasks, ...result.fixTasks]
    this._assertIntegrity(session)

    for (const decision of result.decisions) {
      const payload = {
        planId: session.planId,
        findingId: decision.findingId,
        decision: decision.decision,
        decidedBy: decision.decidedBy,
      }
      session.emit('finding:triaged', decision.fixTask !== undefined ? { ...payload, fixTask: decision.fixTask } : payload)
    }
    for (const task of result.fixTasks) {
      session.emit('task:created', { planId: session.planId, taskNumber: task.number, origin: task.origin, title: task.title })
    }

    if (result.fixTasks.length > 0) {
      return { kind: 'loop', counter: 'verify', reason: `${String(result.fixTasks.length)} fix-task(s) created` }
    }
    return { kind: 'advance', reason: `verification run ${String(iteration)} produced no fix-tasks` }
  }

  /** Affected files of all deliverables plus files of findings that fix-tasks address */
  private _touchedFiles(state: PlanState): string[] {
    const fixFindingIds = new Set(state.tasks.flatMap((t) => t.finding_ids))
    return uniqueNonEmpty([
      ...state.deliverables.flatMap((d) => d.affected_files),
      ...state.findings.filter((f) => fixFindingIds.has(f.id)).map((f) => f.file),
    ]).sort()
  }

  // -------------------------------------------------------------------------
  // 7-finalize
  // -------------------------------------------------------------------------

  private async _finalize(session: PlanSession): Promise<PhaseOutcome> {
    const finalizer = this._finalizer
    if (finalizer === undefined) {
      return { kind: 'advance', reason: 'no finalization actions' }
    }

    const snapshot = toSnapshot(session.state)
    const call = await invokeExternal('finalize', () => finalizer.finalize(snapshot), this._callOptions(session))
    if (!call.ok) {
      this._recordBlocking(session, 'finalize', call.error)
      throw new ExecutionFailureError(`Finalization failed: ${call.error.message}`)
    }
    return { kind: 'advance', reason: 'finalized' }
  }

  // -------------------------------------------------------------------------
  // Outcome application
  // -------------------------------------------------------------------------

  private _applyOutcome(session: PlanSession, phase: WorkPhase, outcome: PhaseOutcome): void {
    switch (outcome.kind) {
      case 'advance':
        this._transition(session, nextPhase(phase), outcome.reason)
        return
      case 'suspend':
        this._suspend(session, outcome.suspension)
        return
      case 'fail':
        this._fail(session, outcome.error)
        return
      case 'loop':
        this._loop(session, phase, outcome.counter, outcome.reason, outcome.suspend)
        return
    }
  }

  private _loop(
    session: PlanSession,
    phase: WorkPhase,
    counter: IterationCounter,
    reason: string,
    suspension?: Suspension,
  ): void {
    const edge = LOOP_BACKS.find((e) => e.from === phase && e.counter === counter)
    if (edge === undefined) {
      throw new PlanStateError(`Phase ${phase} cannot loop on the ${counter} counter`)
    }

    const settings = this._config.plan
    const counters = session.state.plan.iteration_counters
    if (!canLoop(counter, counters, settings)) {
      const limit = maxIterationsFor(counter, settings)
      session.log.error({ phase, counter, limit }, 'Iteration limit exceeded')
      this._fail(
        session,
        new IterationLimitExceededError(phase, limit, { counter, loopsTaken: loopsTaken(counter, counters), reason }),
      )
      return
    }

    session.state.plan = { ...session.state.plan, iteration_counters: countLoop(counter, counters) }
    this._transition(session, edge.to, reason)
    if (suspension !== undefined) this._suspend(session, suspension)
  }

  private _transition(session: PlanSession, to: PlanPhase, reason: string): void {
    const from = session.state.plan.phase
    session.state.plan = applyTransition(session.state.plan, to, reason, session.now)
    session.log.info({ from, to, reason }, 'Phase transition')
    session.emit('plan:phase-changed', { planId: session.planId, from, to, reason })

    if (to === 'complete') {
      const verifyIterations = session.state.plan.iteration_counters.verify_iteration
      session.log.info({ verifyIterations }, 'Plan complete')
      session.emit('plan:completed', { planId: session.planId, verifyIterations })
    }
  }

  private _suspend(session: PlanSession, suspension: Suspension): void {
    const plan = session.state.plan
    session.state.plan = {
      ...plan,
      waiting: { reason: suspension.reason, since: session.now, detail: suspension.detail },
      updated_at: session.now,
    }
    session.log.info({ phase: plan.phase, reason: suspension.reason }, 'Plan suspended')
    session.emit('plan:suspended', {
      planId: session.planId,
      phase: plan.phase,
      reason: suspension.reason,
      detail: suspension.detail,
    })
  }

  private _fail(session: PlanSession, error: PlanwrightError): void {
    const phase = session.state.plan.phase
    const unresolved = unresolvedFindingIds(session.state.findings, session.state.tasks)

    this._transition(session, 'failed', error.message)
    session.state.plan = {
      ...session.state.plan,
      failure: {
        code: error.code,
        message: error.message,
        phase,
        context: error.context,
        unresolved_findings: unresolved,
      },
    }

    session.log.error({ code: error.code, phase, unresolvedFindings: unresolved }, error.message)
    session.emit('plan:failed', {
      planId: session.planId,
      phase,
      code: error.code,
      message: error.message,
      unresolvedFindings: unresolved,
    })
  }

  // -------------------------------------------------------------------------
  // External resume events
  // -------------------------------------------------------------------------

  provideClarification(planId: string, clarification: string): Promise<PlanSnapshot> {
    return this._lock.run(planId, async () => {
      const text = clarification.trim()
      if (text === '') throw new ValidationError('Clarification must not be empty')

      const session = await this._open(planId)
      this._resume(session, '2-refine', 'clarification')
      const { request } = session.state.intake
      session.state.intake = {
        ...session.state.intake,
        request: { ...request, clarifications: [...request.clarifications, text] },
      }
      await session.commit(this._store)
      return toSnapshot(session.state)
    })
  }

  submitReview(planId: string, decision: ReviewDecision): Promise<PlanSnapshot> {
    return this._lock.run(planId, async () => {
      const session = await this._open(planId)
      this._resume(session, '3-outline', 'review')

      const feedback = decision.feedback?.trim() ?? ''
      if (decision.approved) {
        if (feedback !== '') this._appendFeedback(session, feedback)
        this._transition(session, '4-plan', 'review approved')
      } else {
        this._appendFeedback(session, feedback !== '' ? feedback : 'outline rejected without feedback')
        this._loop(session, '3-outline', 'outline', 'review rejected')
        if (session.state.plan.phase === '3-outline') session.state.deliverables = []
      }

      await session.commit(this._store)
      return toSnapshot(session.state)
    })
  }

  overrideBlocked(planId: string, reason: string): Promise<PlanSnapshot> {
    return this._lock.run(planId, async () => {
      const text = reason.trim()
      if (text === '') throw new ValidationError('An override needs a reason')

      const session = await this._open(planId)
      this._resume(session, '5-execute', 'blocked-tasks')
      const plan = session.state.plan
      const already = new Set(plan.blocked_overrides.flatMap((o) => o.tasks))
      const tasks = session.state.tasks
        .filter((t) => t.status === 'blocked' && !already.has(t.number))
        .map((t) => t.number)
      session.state.plan = {
        ...session.state.plan,
        blocked_overrides: [...plan.blocked_overrides, { reason: text, at: session.now, tasks }],
      }
      session.log.warn({ tasks, reason: text }, 'Blocked tasks overridden')

      await session.commit(this._store)
      return toSnapshot(session.state)
    })
  }

  cancel(planId: string, reason: string): Promise<PlanSnapshot> {
    return this._lock.run(planId, async () => {
      const session = await this._open(planId)
      const from = session.state.plan.phase
      session.state.plan = cancelPlanRecord(session.state.plan, reason, session.now)

      const text = session.state.plan.cancellation?.reason ?? reason
      session.log.info({ from, reason: text }, 'Plan cancelled')
      session.emit('plan:phase-changed', { planId, from, to: 'cancelled', reason: text })
      session.emit('plan:cancelled', { planId, phase: from, reason: text })

      await session.commit(this._store)
      return toSnapshot(session.state)
    })
  }

  async getSnapshot(planId: string): Promise<PlanSnapshot> {
    return toSnapshot(await this._store.load(planId))
  }

  /** Leave a wait state; the caller continues with run() */
  private _resume(session: PlanSession, phase: WorkPhase, reason: WaitReason): void {
    const plan = session.state.plan
    if (plan.phase !== phase || plan.waiting?.reason !== reason) {
      throw new PlanStateError(`Plan ${session.planId} is not waiting for ${reason} in ${phase}`, {
        planId: session.planId,
        phase: plan.phase,
        waiting: plan.waiting?.reason,
      })
    }
    const next = { ...plan, updated_at: session.now }
    delete next.waiting
    session.state.plan = next
    session.log.info({ phase, reason }, 'Plan resumed')
    session.emit('plan:resumed', { planId: session.planId, phase, reason })
  }

  private _appendFeedback(session: PlanSession, feedback: string): void {
    const plan = session.state.plan
    session.state.plan = { ...plan, review_feedback: [...plan.review_feedback, feedback] }
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private async _open(planId: string): Promise<PlanSession> {
    const state = await this._store.load(planId)
    return new PlanSession(state, {
      now: this._now(),
      log: childLogger(logger, { planId }),
      ...(this._bus !== undefined ? { bus: this._bus } : {}),
    })
  }

  private _now(): string {
    return this._clock().toISOString()
  }

  private async _freePlanId(base: string): Promise<string> {
    let candidate = base
    for (let suffix = 2; await this._store.exists(candidate); suffix++) {
      candidate = `${base}-${String(suffix)}`
    }
    return candidate
  }

  private _callOptions(session: PlanSession): { timeoutMs: number; logger: PlanSession['log'] } {
    return { timeoutMs: this._config.extensions.timeout_ms, logger: session.log }
  }

  private _reportFallback(session: PlanSession, domain: string, capability: string, log = true): void {
    if (!session.firstFallback(domain, capability)) return
    if (log) session.log.info({ domain, capability }, 'No extension registered; using generic handling')
    session.emit('extension:fallback', { planId: session.planId, domain, capability })
  }

  /**
   * Verify run a finding raised now belongs to: the current run inside
   * 6-verify, otherwise the next one.
   */
  private _findingIteration(session: PlanSession): number {
    const { phase, iteration_counters: counters } = session.state.plan
    return phase === '6-verify' ? counters.verify_iteration : counters.verify_iteration + 1
  }

  private _recordFindings(
    session: PlanSession,
    inputs: readonly z.input<typeof FindingInputSchema>[],
    options: { domain?: string },
  ): Finding[] {
    const parsed: ParsedFindingInput[] = inputs.map((input) => FindingInputSchema.parse(input))
    const { findings, added } = appendFindings(session.state.findings, parsed, {
      verifyIteration: this._findingIteration(session),
      now: session.now,
      ...(options.domain !== undefined ? { domain: options.domain } : {}),
    })
    session.state.findings = findings
    for (const finding of added) {
      session.emit('finding:recorded', {
        planId: session.planId,
        findingId: finding.id,
        source: finding.source,
        severity: finding.severity,
      })
    }
    return added
  }

  /** Surface a failed external call as a blocking finding */
  private _recordBlocking(
    session: PlanSession,
    source: string,
    error: PlanwrightError,
    location: { domain?: string; module?: string | undefined } = {},
  ): void {
    session.log.warn({ source, code: error.code, err: error.message }, 'Recording blocking finding')
    this._recordFindings(
      session,
      [
        {
          source,
          rule: EXTERNAL_CALL_FAILED,
          severity: 'blocker',
          message: error.message,
          ...(location.module !== undefined ? { module: location.module } : {}),
          ...(location.domain !== undefined ? { domain: location.domain } : {}),
        },
      ],
      {},
    )
  }

  private _supersede(session: PlanSession, predicate: (finding: Finding) => boolean): void {
    const { findings, superseded } = supersedeFindings(session.state.findings, predicate)
    if (superseded.length === 0) return
    session.state.findings = findings
    session.log.debug({ superseded }, 'Stale findings superseded')
  }

  private _assertIntegrity(session: PlanSession): void {
    const { deliverables, tasks, findings } = session.state
    const errors = checkReferentialIntegrity(deliverables, tasks, findings)
    if (errors.length > 0) {
      throw new ValidationError(`Task model is inconsistent: ${errors.join('; ')}`, { errors })
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createPhaseOrchestrator(deps: PhaseOrchestratorDeps): PhaseOrchestrator {
  return new PhaseOrchestratorImpl(deps)
}
