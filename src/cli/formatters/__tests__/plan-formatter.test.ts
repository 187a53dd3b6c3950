/**
 * Unit tests for plan-formatter.ts
 */

import { describe, it, expect } from 'vitest'
import { formatPlanStatus, formatTaskTable, formatFindingTable } from '../plan-formatter.js'
import type { PlanRecord, PlanState } from '../../../persistence/schemas/plan-records.js'

const T0 = '2026-04-02T09:00:00.000Z'

function state(plan: Partial<PlanRecord> = {}): PlanState {
  return {
    plan: {
      id: 'rename-api',
      title: 'Rename API',
      phase: '2-refine',
      created_at: T0,
      updated_at: T0,
      iteration_counters: { refine_iteration: 1, outline_iteration: 0, verify_iteration: 0 },
      domains: [],
      phase_history: [],
      review_feedback: [],
      blocked_overrides: [],
      revision: 0,
      ...plan,
    },
    intake: { request: { title: 'Rename API', description: '', clarifications: [] }, context: { modules: [], domains: [] } },
    deliverables: [],
    tasks: [],
    findings: [],
  }
}

describe('formatPlanStatus', () => {
  it('lists the open questions of a waiting plan', () => {
    const text = formatPlanStatus(
      state({ waiting: { reason: 'clarification', since: T0, detail: ['Which endpoints?', 'Keep aliases?'] } }),
    )
    const lines = text.split('\n')

    expect(lines).toContain('Status:      waiting')
    expect(lines).toContain('Domains:     (none)')
    expect(lines.slice(-3)).toEqual([
      `Waiting for clarification since ${T0}`,
      '  - Which endpoints?',
      '  - Keep aliases?',
    ])
  })

  it('shows the failure record with unresolved findings', () => {
    const text = formatPlanStatus(
      state({
        phase: 'failed',
        failure: {
          code: 'ITERATION_LIMIT_EXCEEDED',
          message: 'Iteration limit exceeded in phase 6-verify: max_iterations=2',
          phase: '6-verify',
          context: {},
          unresolved_findings: ['f-1', 'f-2'],
        },
      }),
    )

    expect(text.split('\n').slice(-2)).toEqual([
      'Failed in 6-verify [ITERATION_LIMIT_EXCEEDED]: Iteration limit exceeded in phase 6-verify: max_iterations=2',
      '  Unresolved findings: f-1, f-2',
    ])
  })

  it('shows where a cancelled plan stopped', () => {
    const text = formatPlanStatus(
      state({ phase: 'cancelled', cancellation: { reason: 'duplicate', at: T0, phase: '4-plan' } }),
    )
    expect(text.split('\n').at(-1)).toBe(`Cancelled in 4-plan at ${T0}: duplicate`)
  })
})

describe('empty tables', () => {
  it('prints a placeholder line', () => {
    expect(formatTaskTable([])).toBe('No tasks.')
    expect(formatFindingTable([])).toBe('No findings.')
  })
})
