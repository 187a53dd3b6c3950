/**
 * Unit tests for the findings log helpers.
 */

import { describe, it, expect } from 'vitest'
import {
  appendFindings,
  findingIdOf,
  matchesRoute,
  resolveFindingDomain,
  supersedeFindings,
  unresolvedFindingIds,
} from '../finding-log.js'
import type { Finding, ParsedFindingInput, Task } from '../../../persistence/schemas/plan-records.js'

const NOW = '2026-02-01T08:00:00.000Z'

function input(extra: Partial<ParsedFindingInput> = {}): ParsedFindingInput {
  return {
    source: 'quality',
    rule: 'R1',
    file: 'src/A.java',
    severity: 'major',
    message: 'bad',
    auto_fixable: false,
    ...extra,
  }
}

function finding(id: string, extra: Partial<Finding> = {}): Finding {
  return { ...input(), id, verify_iteration: 1, state: 'new', recorded_at: NOW, ...extra }
}

function task(number: number, status: Task['status']): Task {
  return {
    number,
    title: `Task ${String(number)}`,
    deliverable: null,
    origin: 'fix',
    finding_ids: [],
    status,
    profile: 'implementation',
    domain: 'java',
    module: 'core',
    executor: 'default',
    skills: [],
    steps: [{ number: 1, target: 'src/A.java', outcome: 'pending' }],
    depends_on: [],
    created_at: NOW,
    updated_at: NOW,
  }
}

describe('appendFindings', () => {
  it('assigns content ids that differ per verify run', () => {
    expect(findingIdOf(input({ id: 'explicit' }), 1)).toBe('explicit')
    expect(findingIdOf(input(), 1)).toMatch(/^[0-9a-f]{8}$/)
    expect(findingIdOf(input(), 1)).toBe(findingIdOf(input(), 1))
    expect(findingIdOf(input(), 1)).not.toBe(findingIdOf(input(), 2))
  })

  it('drops repeats within one run and stamps the default domain', () => {
    const existing = [finding('a', { verify_iteration: 2 })]
    const { findings, added } = appendFindings(
      existing,
      [input({ id: 'a' }), input({ id: 'b' }), input({ id: 'b' }), input({ id: 'c', domain: 'web' })],
      { verifyIteration: 2, now: NOW, domain: 'java' },
    )

    expect(findings.map((f) => f.id)).toEqual(['a', 'b', 'c'])
    expect(added.map((f) => [f.id, f.domain, f.verify_iteration, f.state])).toEqual([
      ['b', 'java', 2, 'new'],
      ['c', 'web', 2, 'new'],
    ])
  })

  it('records a finding again when a later run detects it', () => {
    const existing = [finding('a', { state: 'fix-task-created', fix_task: 2 })]
    const report = [input({ id: 'a' }), input({ id: 'a' })]

    const second = appendFindings(existing, report, { verifyIteration: 2, now: NOW })
    expect(second.added.map((f) => [f.id, f.verify_iteration, f.state])).toEqual([['a#2', 2, 'new']])
    expect(second.findings[0]).toEqual(existing[0])

    const third = appendFindings(second.findings, report, { verifyIteration: 3, now: NOW })
    expect(third.findings.map((f) => f.id)).toEqual(['a', 'a#2', 'a#3'])
  })
})

describe('supersedeFindings', () => {
  it('only touches findings that are still new', () => {
    const { findings, superseded } = supersedeFindings(
      [finding('a'), finding('b', { state: 'accepted' }), finding('c', { source: 'build' })],
      (f) => f.source === 'quality',
    )
    expect(superseded).toEqual(['a'])
    expect(findings.map((f) => f.state)).toEqual(['superseded', 'accepted', 'new'])
  })
})

describe('unresolvedFindingIds', () => {
  it('lists new findings and fixes whose task is not done, in triage order', () => {
    const findings = [
      finding('z-minor', { severity: 'minor' }),
      finding('fixed', { state: 'fix-task-created', fix_task: 1 }),
      finding('open-fix', { state: 'fix-task-created', fix_task: 2, severity: 'blocker' }),
      finding('accepted', { state: 'accepted' }),
    ]
    expect(unresolvedFindingIds(findings, [task(1, 'done'), task(2, 'blocked')])).toEqual(['open-fix', 'z-minor'])
  })
})

describe('matchesRoute', () => {
  it('matches suffixes', () => {
    expect(matchesRoute('src/main/java/App.java', '.java')).toBe(true)
    expect(matchesRoute('src/app.ts', '.java')).toBe(false)
  })

  it('matches directory prefixes anywhere in the path', () => {
    expect(matchesRoute('web/src/app.ts', 'web/')).toBe(true)
    expect(matchesRoute('apps/web/src/app.ts', 'web/')).toBe(true)
    expect(matchesRoute('webapp/src/app.ts', 'web/')).toBe(false)
  })

  it('matches globs anchored at the end', () => {
    expect(matchesRoute('pkg/a/b_test.go', 'pkg/*_test.go')).toBe(true)
    expect(matchesRoute('pkg/a/b_test.go.orig', 'pkg/*_test.go')).toBe(false)
    expect(matchesRoute('src/a.b.ts', '*.b.ts')).toBe(true)
  })
})

describe('resolveFindingDomain', () => {
  const routes = [
    { pattern: '.tsx', domain: 'web' },
    { pattern: 'plugin/', domain: 'plugin' },
  ]

  it('prefers the finding domain, then routes, then the plan domain', () => {
    expect(resolveFindingDomain(finding('a', { domain: 'db' }), routes, ['java'])).toBe('db')
    expect(resolveFindingDomain(finding('b', { file: 'ui/App.tsx' }), routes, ['java'])).toBe('web')
    expect(resolveFindingDomain(finding('c'), routes, ['java'])).toBe('java')
    expect(resolveFindingDomain(finding('d'), routes, [])).toBe('generic')
  })

  it('routes by module when the finding has no file', () => {
    const byModule: Finding = { ...finding('e'), module: 'plugin/core' }
    delete byModule.file
    expect(resolveFindingDomain(byModule, routes, ['java'])).toBe('plugin')
  })
})
