/**
 * Task execution state tracking.
 *
 * All functions are pure: they take a task list and return a new one. The
 * phase orchestrator is the only caller that persists the result.
 */

import { ValidationError } from '../../core/errors.js'
import type { Finding, Task, TaskStep } from '../../persistence/schemas/plan-records.js'
import type { TaskStatus } from '../../core/types.js'
import type { BlockPropagation, FixTaskOptions } from './types.js'

/** Terminal per-task states for the purpose of closing 5-execute */
export function isTaskSettled(task: Task): boolean {
  return task.status === 'done' || task.status === 'blocked'
}

/** True when every task is done or blocked */
export function isExecutionSettled(tasks: readonly Task[]): boolean {
  return tasks.every(isTaskSettled)
}

function findTask(tasks: readonly Task[], taskNumber: number): Task {
  const task = tasks.find((t) => t.number === taskNumber)
  if (task === undefined) {
    throw new ValidationError(`Unknown task ${String(taskNumber)}`, { taskNumber })
  }
  return task
}

function replaceTask(tasks: readonly Task[], updated: Task): Task[] {
  return tasks.map((t) => (t.number === updated.number ? updated : t))
}

/** Status implied by step outcomes once execution has started */
function statusFromSteps(steps: readonly TaskStep[]): TaskStatus {
  if (steps.every((s) => s.outcome === 'done')) return 'done'
  if (steps.some((s) => s.outcome === 'failed')) return 'blocked'
  return 'in_progress'
}

// ---------------------------------------------------------------------------
// Step outcomes
// ---------------------------------------------------------------------------

export interface StepOutcomeOptions {
  diagnostic?: string
  now: string
}

/**
 * record_step_outcome: set one step's outcome and recompute the task status.
 *
 * All steps done → task done. Any step failed → task blocked with the step's
 * diagnostic as the reason.
 *
 * @param stepNumber - 1-based step number
 * @throws {ValidationError} for an unknown task or step, or when a step is
 *   marked done while a task it depends on is not done
 */
export function recordStepOutcome(
  tasks: readonly Task[],
  taskNumber: number,
  stepNumber: number,
  outcome: 'done' | 'failed',
  options: StepOutcomeOptions,
): Task[] {
  const task = findTask(tasks, taskNumber)
  const step = task.steps.find((s) => s.number === stepNumber)
  if (step === undefined) {
    throw new ValidationError(`Task ${String(taskNumber)} has no step ${String(stepNumber)}`, {
      taskNumber,
      stepNumber,
    })
  }

  if (outcome === 'done') {
    const pendingDeps = task.depends_on.filter((dep) => findTask(tasks, dep).status !== 'done')
    if (pendingDeps.length > 0) {
      throw new ValidationError(
        `Task ${String(taskNumber)} cannot complete steps before its dependencies: ${pendingDeps.join(', ')}`,
        { taskNumber, pendingDeps },
      )
    }
  }

  const steps = task.steps.map((s): TaskStep => {
    if (s.number !== stepNumber) return s
    const updated: TaskStep = { number: s.number, target: s.target, outcome }
    if (options.diagnostic !== undefined) updated.diagnostic = options.diagnostic
    return updated
  })
  const status = statusFromSteps(steps)

  const updated: Task = { ...task, steps, status, updated_at: options.now }
  if (status === 'blocked') {
    const failed = steps.find((s) => s.outcome === 'failed')
    updated.blocked_reason = failed?.diagnostic ?? `step ${String(failed?.number ?? stepNumber)} failed`
  } else {
    delete updated.blocked_reason
  }
  return replaceTask(tasks, updated)
}

/**
 * Mark a task blocked without a step outcome (executor failure, unreported steps).
 */
export function blockTask(tasks: readonly Task[], taskNumber: number, reason: string, now: string): Task[] {
  const task = findTask(tasks, taskNumber)
  return replaceTask(tasks, { ...task, status: 'blocked', blocked_reason: reason, updated_at: now })
}

/** Set a task's status (used for pending → in_progress) */
export function setTaskStatus(tasks: readonly Task[], taskNumber: number, status: TaskStatus, now: string): Task[] {
  const task = findTask(tasks, taskNumber)
  return replaceTask(tasks, { ...task, status, updated_at: now })
}

// ---------------------------------------------------------------------------
// Scheduling
// ---------------------------------------------------------------------------

/** Pending tasks whose dependencies are all done, in task-number order */
export function readyTasks(tasks: readonly Task[]): Task[] {
  const status = new Map(tasks.map((t) => [t.number, t.status]))
  return tasks
    .filter((t) => t.status === 'pending' && t.depends_on.every((dep) => status.get(dep) === 'done'))
    .sort((a, b) => a.number - b.number)
}

/**
 * Block every pending task that (transitively) depends on a blocked task.
 */
export function blockDependents(tasks: readonly Task[], now: string): BlockPropagation<Task> {
  let current = [...tasks]
  const blocked: number[] = []
  let changed = true

  while (changed) {
    changed = false
    const status = new Map(current.map((t) => [t.number, t.status]))
    for (const task of current) {
      if (task.status !== 'pending') continue
      const blocker = task.depends_on.find((dep) => status.get(dep) === 'blocked')
      if (blocker === undefined) continue
      current = blockTask(current, task.number, `dependency blocked: TASK-${String(blocker)}`, now)
      blocked.push(task.number)
      changed = true
    }
  }

  return { tasks: current, blocked }
}

// ---------------------------------------------------------------------------
// Fix-tasks
// ---------------------------------------------------------------------------

function locationOf(finding: Finding): string {
  if (finding.file !== undefined) {
    return finding.line !== undefined ? `${finding.file}:${String(finding.line)}` : finding.file
  }
  return finding.module ?? finding.source
}

/**
 * Build a fix-task for one or more findings that target the same file or module.
 *
 * Steps: one per distinct location, then a final `verify:<rules>` step that
 * re-checks the original rules.
 */
export function createFixTask(findings: readonly Finding[], options: FixTaskOptions): Task {
  const first = findings[0]
  if (first === undefined) {
    throw new ValidationError('A fix-task needs at least one finding')
  }

  const locations = [...new Set(findings.map(locationOf))]
  const rules = [...new Set(findings.map((f) => f.rule))]
  const steps: TaskStep[] = [...locations, `verify:${rules.join(',')}`].map((target, index): TaskStep => ({
    number: index + 1,
    target,
    outcome: 'pending',
  }))

  const scope = first.file ?? first.module ?? first.source
  const title = findings.length === 1 ? `Fix ${first.rule} in ${scope}` : `Fix ${String(findings.length)} findings in ${scope}`

  return {
    number: options.number,
    title,
    deliverable: null,
    origin: 'fix',
    finding_ids: findings.map((f) => f.id),
    status: 'pending',
    profile: 'implementation',
    domain: options.domain,
    module: findings.find((f) => f.module !== undefined)?.module ?? scope,
    executor: options.executor,
    skills: [],
    steps,
    depends_on: [],
    verify_iteration: options.verifyIteration,
    created_at: options.now,
    updated_at: options.now,
  }
}

/**
 * add_fix_task: append a fix-task for a single finding, numbered after the
 * existing tasks.
 */
export function addFixTask(
  tasks: readonly Task[],
  finding: Finding,
  options: Omit<FixTaskOptions, 'number'>,
): { tasks: Task[]; task: Task } {
  const task = createFixTask([finding], { ...options, number: nextTaskNumber(tasks) })
  return { tasks: [...tasks, task], task }
}

/** Next free task number */
export function nextTaskNumber(tasks: readonly Task[]): number {
  return tasks.reduce((max, t) => Math.max(max, t.number), 0) + 1
}
