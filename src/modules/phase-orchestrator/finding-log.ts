/**
 * Findings log helpers: id assignment, de-duplication, logical clearing and
 * domain routing. Pure functions over the plan's findings list.
 */

import type { DomainRoute } from '../config/config-schema.js'
import type { Finding, ParsedFindingInput, Task } from '../../persistence/schemas/plan-records.js'
import { shortHash } from '../../utils/helpers.js'
import { sortFindings } from '../triage/ordering.js'

export const GENERIC_DOMAIN = 'generic'

/** Rule of the blocking finding recorded when an external call fails after its retry */
export const EXTERNAL_CALL_FAILED = 'external-call-failed'

export interface AppendFindingsOptions {
  verifyIteration: number
  now: string
  /** Domain stamped on findings that carry none */
  domain?: string
}

/** Id of a reported finding: its own, else a digest of its content and run */
export function findingIdOf(input: ParsedFindingInput, verifyIteration: number): string {
  return (
    input.id ??
    shortHash([verifyIteration, input.source, input.rule, input.file, input.line, input.module, input.message])
  )
}

/**
 * Append reported findings in state `new`.
 *
 * A reporter-supplied id that is already in the log from an earlier verify
 * run is a re-detection: it is recorded again as `<id>#<run>` so the defect
 * goes through triage once more. Repeats within one run are dropped.
 *
 * @returns the full list and the findings actually added
 */
export function appendFindings(
  existing: readonly Finding[],
  inputs: readonly ParsedFindingInput[],
  options: AppendFindingsOptions,
): { findings: Finding[]; added: Finding[] } {
  const byId = new Map(existing.map((f) => [f.id, f]))
  const added: Finding[] = []

  for (const input of inputs) {
    let id = findingIdOf(input, options.verifyIteration)
    const earlier = byId.get(id)
    if (earlier !== undefined && earlier.verify_iteration !== options.verifyIteration) {
      id = rerunFindingId(id, options.verifyIteration)
    }
    if (byId.has(id)) continue

    const finding: Finding = {
      ...input,
      id,
      verify_iteration: options.verifyIteration,
      state: 'new',
      recorded_at: options.now,
    }
    const domain = input.domain ?? options.domain
    if (domain !== undefined) finding.domain = domain
    byId.set(id, finding)
    added.push(finding)
  }

  return { findings: [...existing, ...added], added }
}

/** Id under which a finding re-detected in a later verify run is recorded */
function rerunFindingId(id: string, verifyIteration: number): string {
  return `${id}#${String(verifyIteration)}`
}

/**
 * Mark findings still `new` that match `predicate` as superseded.
 */
export function supersedeFindings(
  findings: readonly Finding[],
  predicate: (finding: Finding) => boolean,
): { findings: Finding[]; superseded: string[] } {
  const superseded: string[] = []
  const updated = findings.map((finding): Finding => {
    if (finding.state !== 'new' || !predicate(finding)) return finding
    superseded.push(finding.id)
    return { ...finding, state: 'superseded' }
  })
  return { findings: updated, superseded }
}

/**
 * Findings that still need attention: untriaged ones, and FIX decisions
 * whose fix-task is not done. Stable triage order.
 */
export function unresolvedFindingIds(findings: readonly Finding[], tasks: readonly Task[]): string[] {
  const done = new Set(tasks.filter((t) => t.status === 'done').map((t) => t.number))
  const open = findings.filter(
    (f) =>
      f.state === 'new' ||
      (f.state === 'fix-task-created' && (f.fix_task === undefined || !done.has(f.fix_task))),
  )
  return sortFindings(open).map((f) => f.id)
}

// ---------------------------------------------------------------------------
// Domain routing
// ---------------------------------------------------------------------------

function escapeRegExp(text: string): string {
  return text.replace(/[.+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Match a path against a route pattern. `*` matches any run of characters
 * and the pattern is anchored at the end of the path; a pattern ending in
 * `/` matches every path under that directory.
 *
 * @example
 * matchesRoute('src/main/java/App.java', '.java')     // true
 * matchesRoute('web/src/app.ts', 'web/')             // true
 * matchesRoute('pkg/a/b_test.go', 'pkg/*_test.go')   // true
 */
export function matchesRoute(path: string, pattern: string): boolean {
  if (pattern.endsWith('/')) {
    return path.startsWith(pattern) || path.includes(`/${pattern}`)
  }
  if (pattern.includes('*')) {
    const body = pattern.split('*').map(escapeRegExp).join('.*')
    return new RegExp(`${body}$`).test(path)
  }
  return path.endsWith(pattern)
}

/**
 * Domain whose triage handler applies to a finding: its own domain, else the
 * first matching route for its file (or module), else the plan's first
 * domain, else `generic`.
 */
export function resolveFindingDomain(
  finding: Finding,
  routes: readonly DomainRoute[],
  planDomains: readonly string[],
): string {
  if (finding.domain !== undefined) return finding.domain
  const location = finding.file ?? finding.module
  if (location !== undefined) {
    const route = routes.find((r) => matchesRoute(location, r.pattern))
    if (route !== undefined) return route.domain
  }
  return planDomains[0] ?? GENERIC_DOMAIN
}
