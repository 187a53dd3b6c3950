/**
 * Tests for the plan inspection commands: list, status, tasks, findings, cancel.
 *
 * Each test seeds a file-backed store under a temporary project root and
 * captures stdout / stderr.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { MockInstance } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { FilePlanStore } from '../../../modules/plan-store/file-plan-store.js'
import type { PlanState } from '../../../persistence/schemas/plan-records.js'
import { runListAction } from '../list.js'
import { runStatusAction } from '../status.js'
import { runTasksAction } from '../tasks.js'
import { runFindingsAction } from '../findings.js'
import { runCancelAction } from '../cancel.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR } from '../../utils/command-context.js'

const NOW = '2026-03-01T10:00:00.000Z'

function makeState(id: string): PlanState {
  return {
    plan: {
      id,
      title: 'Add login',
      phase: '6-verify',
      created_at: NOW,
      updated_at: NOW,
      iteration_counters: { refine_iteration: 1, outline_iteration: 0, verify_iteration: 2 },
      domains: ['java'],
      phase_history: [{ phase: '6-verify', entered_at: NOW, reason: 'all tasks done' }],
      review_feedback: [],
      blocked_overrides: [],
      revision: 0,
    },
    intake: {
      request: { title: 'Add login', description: 'Users sign in', clarifications: [] },
      context: { modules: [{ name: 'auth', domain: 'java' }], domains: ['java'] },
    },
    deliverables: [],
    tasks: [
      {
        number: 1,
        title: 'Login endpoint [implementation]',
        deliverable: 1,
        origin: 'normal',
        finding_ids: [],
        status: 'done',
        profile: 'implementation',
        domain: 'java',
        module: 'auth',
        executor: 'task-implementation',
        skills: [],
        steps: [{ number: 1, target: 'src/Login.java', outcome: 'done' }],
        depends_on: [],
        created_at: NOW,
        updated_at: NOW,
      },
      {
        number: 2,
        title: 'Fix S100',
        deliverable: null,
        origin: 'fix',
        finding_ids: ['f-open'],
        status: 'pending',
        profile: 'implementation',
        domain: 'java',
        module: 'auth',
        executor: 'task-implementation',
        skills: [],
        steps: [{ number: 1, target: 'src/Login.java', outcome: 'pending' }],
        depends_on: [1],
        verify_iteration: 2,
        created_at: NOW,
        updated_at: NOW,
      },
    ],
    findings: [
      {
        id: 'f-open',
        source: 'quality',
        rule: 'S100',
        file: 'src/Login.java',
        line: 12,
        severity: 'major',
        message: 'Rename method',
        auto_fixable: false,
        verify_iteration: 2,
        state: 'fix-task-created',
        triage: { decision: 'FIX', decided_by: 'default' },
        fix_task: 2,
        recorded_at: NOW,
      },
      {
        id: 'f-minor',
        source: 'quality',
        rule: 'S200',
        module: 'auth',
        severity: 'minor',
        message: 'Long line',
        auto_fixable: false,
        verify_iteration: 2,
        state: 'accepted',
        triage: { decision: 'ACCEPT', decided_by: 'default' },
        recorded_at: NOW,
      },
    ],
  }
}

let projectRoot: string
let stdoutSpy: MockInstance<typeof process.stdout.write>
let stderrSpy: MockInstance<typeof process.stderr.write>

function stdout(): string {
  return stdoutSpy.mock.calls.map((call) => String(call[0])).join('')
}

function stderr(): string {
  return stderrSpy.mock.calls.map((call) => String(call[0])).join('')
}

function jsonData(): unknown {
  const parsed: unknown = JSON.parse(stdout())
  if (typeof parsed === 'object' && parsed !== null && 'data' in parsed) {
    return parsed.data
  }
  throw new Error('no JSON envelope on stdout')
}

async function seed(...ids: string[]): Promise<void> {
  const store = new FilePlanStore({ root: join(projectRoot, '.planwright') })
  for (const id of ids) {
    await store.create(makeState(id))
  }
  await store.close()
}

function baseOptions(outputFormat: 'human' | 'json' = 'human') {
  return { projectRoot, outputFormat, version: '1.2.3', globalConfigDir: join(projectRoot, 'global') }
}

beforeEach(() => {
  projectRoot = mkdtempSync(join(tmpdir(), 'planwright-cli-test-'))
  stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)
  stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)
})

afterEach(() => {
  vi.restoreAllMocks()
  rmSync(projectRoot, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

describe('runListAction', () => {
  it('reports an empty store', async () => {
    const code = await runListAction(baseOptions())
    expect(code).toBe(EXIT_SUCCESS)
    expect(stdout()).toBe('No plans found.\n')
  })

  it('lists stored plans as a table', async () => {
    await seed('add-login')
    await runListAction(baseOptions())

    const lines = stdout().split('\n')
    expect(lines[0]).toBe('ID        | Title     | Phase    | Status  | Updated')
    expect(lines[2]).toBe(`add-login | Add login | 6-verify | running | ${NOW}`)
  })

  it('emits the JSON envelope', async () => {
    await seed('add-login', 'fix-typo')
    await runListAction(baseOptions('json'))

    const envelope: unknown = JSON.parse(stdout())
    expect(envelope).toMatchObject({ version: '1.2.3', command: 'planwright list' })
    expect(jsonData()).toEqual([
      { id: 'add-login', title: 'Add login', phase: '6-verify', status: 'running', created_at: NOW, updated_at: NOW },
      { id: 'fix-typo', title: 'Add login', phase: '6-verify', status: 'running', created_at: NOW, updated_at: NOW },
    ])
  })
})

// ---------------------------------------------------------------------------
// status
// ---------------------------------------------------------------------------

describe('runStatusAction', () => {
  it('prints the summary block', async () => {
    await seed('add-login')
    const code = await runStatusAction({ ...baseOptions(), planId: 'add-login' })

    expect(code).toBe(EXIT_SUCCESS)
    const lines = stdout().split('\n')
    expect(lines).toContain('Iterations:  refine 1, outline 0, verify 2')
    expect(lines).toContain('Tasks:       1/2 done')
    expect(lines).toContain('Findings:    2 (1 unresolved)')
  })

  it('includes the unresolved findings in JSON output', async () => {
    await seed('add-login')
    await runStatusAction({ ...baseOptions('json'), planId: 'add-login' })

    expect(jsonData()).toMatchObject({
      id: 'add-login',
      status: 'running',
      task_count: 2,
      tasks_done: 1,
      unresolved_findings: ['f-open'],
    })
  })

  it('exits with a usage error for an unknown plan', async () => {
    const code = await runStatusAction({ ...baseOptions(), planId: 'nope' })
    expect(code).toBe(EXIT_USAGE_ERROR)
    expect(stderr()).toBe('Error: Plan not found: nope\n')
  })
})

// ---------------------------------------------------------------------------
// tasks / findings
// ---------------------------------------------------------------------------

describe('runTasksAction', () => {
  it('prints one row per task', async () => {
    await seed('add-login')
    await runTasksAction({ ...baseOptions(), planId: 'add-login' })

    const lines = stdout().split('\n')
    expect(lines[2]).toMatch(/^TASK-1 \| Login endpoint \[implementation\] \| done/)
    expect(lines[3]).toMatch(/^TASK-2 \| Fix S100 +\| pending \| fix/)
  })

  it('returns the stored tasks as JSON', async () => {
    await seed('add-login')
    await runTasksAction({ ...baseOptions('json'), planId: 'add-login' })
    expect(jsonData()).toEqual(makeState('add-login').tasks)
  })
})

describe('runFindingsAction', () => {
  it('filters to unresolved findings', async () => {
    await seed('add-login')
    await runFindingsAction({ ...baseOptions('json'), planId: 'add-login', unresolved: true })

    const data = jsonData()
    expect(Array.isArray(data) ? data.length : -1).toBe(1)
    expect(data).toMatchObject([{ id: 'f-open', fix_task: 2 }])
  })

  it('shows file and line as the location', async () => {
    await seed('add-login')
    await runFindingsAction({ ...baseOptions(), planId: 'add-login' })

    const lines = stdout().split('\n')
    expect(lines[2]).toBe('f-open  | major    | fix-task-created | FIX      | src/Login.java:12 | Rename method')
    expect(lines[3]).toBe('f-minor | minor    | accepted         | ACCEPT   | auth              | Long line')
  })
})

// ---------------------------------------------------------------------------
// cancel
// ---------------------------------------------------------------------------

describe('runCancelAction', () => {
  it('cancels the plan and persists the cancellation', async () => {
    await seed('add-login')
    const code = await runCancelAction({ ...baseOptions(), planId: 'add-login', reason: 'superseded' })

    expect(code).toBe(EXIT_SUCCESS)
    expect(stdout()).toBe('Plan add-login cancelled (was in 6-verify).\n')

    const store = new FilePlanStore({ root: join(projectRoot, '.planwright') })
    const { plan } = await store.load('add-login')
    await store.close()
    expect(plan.phase).toBe('cancelled')
    expect(plan.revision).toBe(1)
    expect(plan.cancellation).toMatchObject({ reason: 'superseded', phase: '6-verify' })
  })

  it('refuses to cancel a plan twice', async () => {
    await seed('add-login')
    await runCancelAction({ ...baseOptions(), planId: 'add-login' })
    const code = await runCancelAction({ ...baseOptions(), planId: 'add-login' })

    expect(code).toBe(EXIT_USAGE_ERROR)
    expect(stderr()).toBe('Error: Plan add-login is already cancelled\n')
  })
})
