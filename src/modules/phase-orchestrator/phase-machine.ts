/**
 * Phase state machine: pure transition rules for the plan lifecycle.
 *
 *   1-init → 2-refine → 3-outline → 4-plan → 5-execute → 6-verify → 7-finalize → complete
 *
 * Loop-backs: 2-refine → 2-refine, 3-outline → 3-outline, 6-verify → 5-execute.
 * Any non-terminal phase may move to `failed` or `cancelled`.
 */

import { InvalidTransitionError, PlanStateError } from '../../core/errors.js'
import { TERMINAL_PHASES, WORK_PHASES } from '../../core/types.js'
import type { IterationCounter, PlanPhase, PlanStatus, TerminalPhase, WorkPhase } from '../../core/types.js'
import type { PlanSettings } from '../config/config-schema.js'
import type { IterationCounters, PlanRecord } from '../../persistence/schemas/plan-records.js'

// ---------------------------------------------------------------------------
// Phase vocabulary
// ---------------------------------------------------------------------------

/** Loop-back edges and the counter each one consumes */
export const LOOP_BACKS: ReadonlyArray<{ from: WorkPhase; to: WorkPhase; counter: IterationCounter }> = [
  { from: '2-refine', to: '2-refine', counter: 'refine' },
  { from: '3-outline', to: '3-outline', counter: 'outline' },
  { from: '6-verify', to: '5-execute', counter: 'verify' },
]

export function isTerminalPhase(phase: PlanPhase): phase is TerminalPhase {
  return TERMINAL_PHASES.some((p) => p === phase)
}

function workIndex(phase: PlanPhase): number {
  return WORK_PHASES.findIndex((p) => p === phase)
}

/** The phase after `phase` on the forward path (7-finalize → complete) */
export function nextPhase(phase: WorkPhase): PlanPhase {
  return WORK_PHASES[workIndex(phase) + 1] ?? 'complete'
}

export function isAllowedTransition(from: PlanPhase, to: PlanPhase): boolean {
  if (isTerminalPhase(from)) return false
  if (to === 'failed' || to === 'cancelled') return true
  if (nextPhase(from) === to) return true
  return LOOP_BACKS.some((edge) => edge.from === from && edge.to === to)
}

/**
 * @throws {InvalidTransitionError} when `from → to` is not an edge of the machine
 */
export function assertTransition(from: PlanPhase, to: PlanPhase): void {
  if (!isAllowedTransition(from, to)) {
    throw new InvalidTransitionError(from, to)
  }
}

/**
 * Consecutive pairs of a phase history that are not edges of the machine.
 * Empty for every history this module produces.
 */
export function findInvalidTransitions(history: readonly { phase: PlanPhase }[]): Array<[PlanPhase, PlanPhase]> {
  const invalid: Array<[PlanPhase, PlanPhase]> = []
  for (let i = 1; i < history.length; i++) {
    const from = history[i - 1]?.phase
    const to = history[i]?.phase
    if (from !== undefined && to !== undefined && !isAllowedTransition(from, to)) invalid.push([from, to])
  }
  return invalid
}

// ---------------------------------------------------------------------------
// Iteration ceilings
// ---------------------------------------------------------------------------

export function maxIterationsFor(counter: IterationCounter, settings: PlanSettings): number {
  switch (counter) {
    case 'refine':
      return settings.refine.max_iterations
    case 'outline':
      return settings.outline.max_iterations
    case 'verify':
      return settings.verify.max_iterations
  }
}

/**
 * Loop-backs already taken for a counter. `refine_iteration` and
 * `outline_iteration` count loops; `verify_iteration` counts verification
 * runs, so its loops are one fewer.
 */
export function loopsTaken(counter: IterationCounter, counters: IterationCounters): number {
  switch (counter) {
    case 'refine':
      return counters.refine_iteration
    case 'outline':
      return counters.outline_iteration
    case 'verify':
      return Math.max(0, counters.verify_iteration - 1)
  }
}

/** A loop-back is permitted only while fewer than `max_iterations` have been taken */
export function canLoop(counter: IterationCounter, counters: IterationCounters, settings: PlanSettings): boolean {
  return loopsTaken(counter, counters) < maxIterationsFor(counter, settings)
}

/** Counters after taking one loop-back (verify is counted per run instead) */
export function countLoop(counter: IterationCounter, counters: IterationCounters): IterationCounters {
  switch (counter) {
    case 'refine':
      return { ...counters, refine_iteration: counters.refine_iteration + 1 }
    case 'outline':
      return { ...counters, outline_iteration: counters.outline_iteration + 1 }
    case 'verify':
      return counters
  }
}

// ---------------------------------------------------------------------------
// Plan record transitions
// ---------------------------------------------------------------------------

/**
 * Move a plan record to `to`: closes the open history entry and opens a new
 * one. Self-loops produce a new entry too.
 *
 * @throws {InvalidTransitionError}
 */
export function applyTransition(plan: PlanRecord, to: PlanPhase, reason: string, now: string): PlanRecord {
  assertTransition(plan.phase, to)
  const history = plan.phase_history.map((entry, index, all) =>
    index === all.length - 1 && entry.exited_at === undefined ? { ...entry, exited_at: now } : entry,
  )
  history.push({ phase: to, entered_at: now, reason })

  const next: PlanRecord = { ...plan, phase: to, phase_history: history, updated_at: now }
  delete next.waiting
  return next
}

/**
 * Cancel a plan: transition to `cancelled` and record the reason and the
 * phase it was in. An empty reason becomes `cancelled`.
 *
 * @throws {PlanStateError} when the plan is already terminal
 */
export function cancelPlanRecord(plan: PlanRecord, reason: string, now: string): PlanRecord {
  if (isTerminalPhase(plan.phase)) {
    throw new PlanStateError(`Plan ${plan.id} is already ${plan.phase}`, { planId: plan.id, phase: plan.phase })
  }
  const text = reason.trim() !== '' ? reason.trim() : 'cancelled'
  return {
    ...applyTransition(plan, 'cancelled', text, now),
    cancellation: { reason: text, at: now, phase: plan.phase },
  }
}

/** Externally visible status derived from phase and wait state */
export function planStatus(plan: PlanRecord): PlanStatus {
  if (isTerminalPhase(plan.phase)) return plan.phase
  return plan.waiting !== undefined ? 'waiting' : 'running'
}
