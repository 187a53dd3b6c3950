/**
 * Unit tests for deriveTasks
 */

import { describe, it, expect } from 'vitest'
import { deriveTasks, orderProfiles } from '../task-deriver.js'
import { DependencyCycleError } from '../../../core/errors.js'
import type { Deliverable } from '../../../persistence/schemas/plan-records.js'

const NOW = '2026-01-01T00:00:00.000Z'

function deliverable(number: number, depends_on: number[] = [], extra: Partial<Deliverable> = {}): Deliverable {
  return {
    number,
    title: `D${String(number)}`,
    description: '',
    change_type: 'feature',
    domain: 'java',
    module: `mod-${String(number)}`,
    affected_files: [],
    profiles: ['implementation', 'module_testing'],
    skills: [],
    depends_on,
    ...extra,
  }
}

const OPTIONS = {
  profileOrder: ['implementation', 'module_testing'],
  executorFor: (_d: Deliverable, profile: string) => `${profile}-exec`,
  now: NOW,
}

describe('deriveTasks', () => {
  it('generates a dependency’s tasks strictly before the dependent’s', () => {
    const tasks = deriveTasks([deliverable(1), deliverable(2, [1])], OPTIONS)

    expect(tasks.map((t) => [t.number, t.deliverable, t.profile, t.depends_on])).toEqual([
      [1, 1, 'implementation', []],
      [2, 1, 'module_testing', [1]],
      [3, 2, 'implementation', [1, 2]],
      [4, 2, 'module_testing', [1, 2, 3]],
    ])
  })

  it('follows dependency order even when numbering disagrees', () => {
    const tasks = deriveTasks(
      [deliverable(1, [2], { profiles: ['implementation'] }), deliverable(2, [], { profiles: ['implementation'] })],
      OPTIONS,
    )
    expect(tasks.map((t) => [t.number, t.deliverable, t.depends_on])).toEqual([
      [1, 2, []],
      [2, 1, [1]],
    ])
  })

  it('creates one step per affected file, or one on the module', () => {
    const tasks = deriveTasks(
      [
        deliverable(1, [], { profiles: ['implementation'], affected_files: ['src/A.java', 'src/B.java'] }),
        deliverable(2, [], { profiles: ['implementation'] }),
      ],
      OPTIONS,
    )
    expect(tasks[0]?.steps).toEqual([
      { number: 1, target: 'src/A.java', outcome: 'pending' },
      { number: 2, target: 'src/B.java', outcome: 'pending' },
    ])
    expect(tasks[1]?.steps).toEqual([{ number: 1, target: 'mod-2', outcome: 'pending' }])
  })

  it('stamps executor, origin and status on every task', () => {
    const [task] = deriveTasks([deliverable(1, [], { profiles: ['implementation'] })], OPTIONS)
    expect(task).toMatchObject({
      title: 'D1 [implementation]',
      origin: 'normal',
      status: 'pending',
      executor: 'implementation-exec',
      finding_ids: [],
      created_at: NOW,
    })
  })

  it('starts numbering at startNumber', () => {
    const tasks = deriveTasks([deliverable(1)], { ...OPTIONS, startNumber: 5 })
    expect(tasks.map((t) => t.number)).toEqual([5, 6])
    expect(tasks[1]?.depends_on).toEqual([5])
  })

  it('rejects cyclic deliverables', () => {
    expect(() => deriveTasks([deliverable(1, [2]), deliverable(2, [1])], OPTIONS)).toThrow(DependencyCycleError)
  })
})

describe('orderProfiles', () => {
  it('sorts known profiles by configured order and keeps unknown ones last', () => {
    expect(orderProfiles(['custom', 'module_testing', 'implementation'], ['implementation', 'module_testing'])).toEqual([
      'implementation',
      'module_testing',
      'custom',
    ])
  })

  it('drops duplicates', () => {
    expect(orderProfiles(['implementation', 'implementation'], ['implementation'])).toEqual(['implementation'])
  })
})
