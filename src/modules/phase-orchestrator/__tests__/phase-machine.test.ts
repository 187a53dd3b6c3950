/**
 * Unit tests for the phase state machine.
 */

import { describe, it, expect } from 'vitest'
import {
  applyTransition,
  cancelPlanRecord,
  canLoop,
  countLoop,
  findInvalidTransitions,
  isAllowedTransition,
  loopsTaken,
  nextPhase,
  planStatus,
} from '../phase-machine.js'
import { DEFAULT_PLAN_SETTINGS } from '../../config/defaults.js'
import { InvalidTransitionError, PlanStateError } from '../../../core/errors.js'
import type { PlanRecord } from '../../../persistence/schemas/plan-records.js'

const T0 = '2026-02-01T08:00:00.000Z'
const T1 = '2026-02-01T08:05:00.000Z'

function plan(extra: Partial<PlanRecord> = {}): PlanRecord {
  return {
    id: 'demo',
    title: 'Demo',
    phase: '2-refine',
    created_at: T0,
    updated_at: T0,
    iteration_counters: { refine_iteration: 0, outline_iteration: 0, verify_iteration: 0 },
    domains: [],
    phase_history: [
      { phase: '1-init', entered_at: T0, exited_at: T0, reason: 'intake persisted' },
      { phase: '2-refine', entered_at: T0, reason: 'intake persisted' },
    ],
    review_feedback: [],
    blocked_overrides: [],
    revision: 0,
    ...extra,
  }
}

describe('phase machine', () => {
  it('walks the forward path to complete', () => {
    expect(nextPhase('1-init')).toBe('2-refine')
    expect(nextPhase('6-verify')).toBe('7-finalize')
    expect(nextPhase('7-finalize')).toBe('complete')
  })

  it('allows only forward edges, loop-backs and terminal exits', () => {
    expect(isAllowedTransition('2-refine', '2-refine')).toBe(true)
    expect(isAllowedTransition('6-verify', '5-execute')).toBe(true)
    expect(isAllowedTransition('5-execute', 'cancelled')).toBe(true)
    expect(isAllowedTransition('4-plan', '2-refine')).toBe(false)
    expect(isAllowedTransition('4-plan', '6-verify')).toBe(false)
    expect(isAllowedTransition('5-execute', '5-execute')).toBe(false)
    expect(isAllowedTransition('complete', 'failed')).toBe(false)
  })

  it('reports invalid pairs in a history', () => {
    expect(
      findInvalidTransitions([{ phase: '1-init' }, { phase: '2-refine' }, { phase: '4-plan' }, { phase: 'failed' }]),
    ).toEqual([['2-refine', '4-plan']])
  })

  it('counts verify loops as runs minus one', () => {
    const counters = { refine_iteration: 2, outline_iteration: 0, verify_iteration: 3 }
    expect(loopsTaken('refine', counters)).toBe(2)
    expect(loopsTaken('verify', counters)).toBe(2)
    expect(loopsTaken('verify', { ...counters, verify_iteration: 0 })).toBe(0)
  })

  it('permits a loop only below the ceiling', () => {
    const settings = { ...DEFAULT_PLAN_SETTINGS, refine: { confidence_threshold: 95, max_iterations: 2 } }
    const counters = { refine_iteration: 1, outline_iteration: 0, verify_iteration: 0 }
    expect(canLoop('refine', counters, settings)).toBe(true)
    expect(canLoop('refine', countLoop('refine', counters), settings)).toBe(false)
    expect(countLoop('verify', counters)).toBe(counters)
  })

  it('closes the open history entry and clears the wait state', () => {
    const waiting = plan({ waiting: { reason: 'clarification', since: T0, detail: [] } })
    const next = applyTransition(waiting, '3-outline', 'confident', T1)

    expect(next.phase).toBe('3-outline')
    expect(next.updated_at).toBe(T1)
    expect(next.waiting).toBeUndefined()
    expect(next.phase_history.slice(1)).toEqual([
      { phase: '2-refine', entered_at: T0, exited_at: T1, reason: 'intake persisted' },
      { phase: '3-outline', entered_at: T1, reason: 'confident' },
    ])
    expect(waiting.phase_history[1]?.exited_at).toBeUndefined()
  })

  it('throws InvalidTransitionError for an edge the machine does not have', () => {
    expect(() => applyTransition(plan(), '5-execute', 'skip', T1)).toThrow(InvalidTransitionError)
    expect(() => applyTransition(plan(), '5-execute', 'skip', T1)).toThrow(
      'Invalid phase transition: 2-refine -> 5-execute',
    )
  })

  it('derives the status from phase and wait state', () => {
    expect(planStatus(plan())).toBe('running')
    expect(planStatus(plan({ waiting: { reason: 'review', since: T0, detail: [] } }))).toBe('waiting')
    expect(planStatus(plan({ phase: 'failed' }))).toBe('failed')
  })

  it('cancels a running plan and records where it stopped', () => {
    const cancelled = cancelPlanRecord(plan(), '  superseded by #12 ', T1)
    expect(cancelled.phase).toBe('cancelled')
    expect(cancelled.cancellation).toEqual({ reason: 'superseded by #12', at: T1, phase: '2-refine' })
    expect(cancelled.phase_history.at(-1)).toEqual({ phase: 'cancelled', entered_at: T1, reason: 'superseded by #12' })
    expect(cancelPlanRecord(plan(), '', T1).cancellation?.reason).toBe('cancelled')
    expect(() => cancelPlanRecord(cancelled, 'again', T1)).toThrow(PlanStateError)
  })
})
