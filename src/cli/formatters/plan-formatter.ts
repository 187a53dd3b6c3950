/**
 * plan-formatter.ts: Human-readable formatters for persisted plans.
 *
 * Used by the `list`, `status`, `tasks` and `findings` commands.
 */

import type { Finding, PlanRecord, PlanState, Task } from '../../persistence/schemas/plan-records.js'
import { planStatus } from '../../modules/phase-orchestrator/phase-machine.js'
import { unresolvedFindingIds } from '../../modules/phase-orchestrator/finding-log.js'
import { formatTable } from '../utils/formatting.js'

// ---------------------------------------------------------------------------
// formatPlanList
// ---------------------------------------------------------------------------

export function formatPlanList(plans: PlanRecord[]): string {
  if (plans.length === 0) {
    return 'No plans found.'
  }

  const rows = plans.map((p) => ({
    id: p.id,
    title: truncate(p.title, 40),
    phase: p.phase,
    status: planStatus(p),
    updated: p.updated_at,
  }))

  return formatTable(
    ['ID', 'Title', 'Phase', 'Status', 'Updated'],
    rows,
    ['id', 'title', 'phase', 'status', 'updated'],
  )
}

// ---------------------------------------------------------------------------
// formatPlanStatus
// ---------------------------------------------------------------------------

/**
 * Summary block for a single plan: phase, counters, wait state and the
 * failure or cancellation record when there is one.
 */
export function formatPlanStatus(state: PlanState): string {
  const { plan, tasks } = state
  const counters = plan.iteration_counters
  const done = tasks.filter((t) => t.status === 'done').length
  const blocked = tasks.filter((t) => t.status === 'blocked').length
  const unresolved = unresolvedFindingIds(state.findings, tasks)

  const lines: string[] = []
  lines.push(`Plan:        ${plan.id}`)
  lines.push(`Title:       ${plan.title}`)
  lines.push(`Phase:       ${plan.phase}`)
  lines.push(`Status:      ${planStatus(plan)}`)
  lines.push(`Domains:     ${plan.domains.length > 0 ? plan.domains.join(', ') : '(none)'}`)
  lines.push(
    `Iterations:  refine ${String(counters.refine_iteration)}, outline ${String(counters.outline_iteration)}, verify ${String(counters.verify_iteration)}`,
  )
  lines.push(`Deliverables: ${String(state.deliverables.length)}`)
  lines.push(`Tasks:       ${String(done)}/${String(tasks.length)} done${blocked > 0 ? `, ${String(blocked)} blocked` : ''}`)
  lines.push(`Findings:    ${String(state.findings.length)} (${String(unresolved.length)} unresolved)`)

  if (plan.waiting !== undefined) {
    lines.push('')
    lines.push(`Waiting for ${plan.waiting.reason} since ${plan.waiting.since}`)
    for (const item of plan.waiting.detail) {
      lines.push(`  - ${item}`)
    }
  }

  if (plan.failure !== undefined) {
    lines.push('')
    lines.push(`Failed in ${plan.failure.phase} [${plan.failure.code}]: ${plan.failure.message}`)
    if (plan.failure.unresolved_findings.length > 0) {
      lines.push(`  Unresolved findings: ${plan.failure.unresolved_findings.join(', ')}`)
    }
  }

  if (plan.cancellation !== undefined) {
    lines.push('')
    lines.push(`Cancelled in ${plan.cancellation.phase} at ${plan.cancellation.at}: ${plan.cancellation.reason}`)
  }

  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// formatTaskTable
// ---------------------------------------------------------------------------

export function formatTaskTable(tasks: Task[]): string {
  if (tasks.length === 0) {
    return 'No tasks.'
  }

  const rows = tasks.map((t) => ({
    number: `TASK-${String(t.number)}`,
    title: truncate(t.title, 40),
    status: t.status,
    origin: t.origin,
    profile: t.profile,
    executor: t.executor,
    deps: t.depends_on.length > 0 ? t.depends_on.join(',') : '-',
  }))

  return formatTable(
    ['Task', 'Title', 'Status', 'Origin', 'Profile', 'Executor', 'Deps'],
    rows,
    ['number', 'title', 'status', 'origin', 'profile', 'executor', 'deps'],
  )
}

// ---------------------------------------------------------------------------
// formatFindingTable
// ---------------------------------------------------------------------------

export function formatFindingTable(findings: Finding[]): string {
  if (findings.length === 0) {
    return 'No findings.'
  }

  const rows = findings.map((f) => ({
    id: f.id,
    severity: f.severity,
    state: f.state,
    decision: f.triage?.decision ?? '-',
    location: findingLocation(f),
    message: truncate(f.message, 60),
  }))

  return formatTable(
    ['ID', 'Severity', 'State', 'Decision', 'Location', 'Message'],
    rows,
    ['id', 'severity', 'state', 'decision', 'location', 'message'],
  )
}

function findingLocation(f: Finding): string {
  if (f.file !== undefined) {
    return f.line !== undefined ? `${f.file}:${String(f.line)}` : f.file
  }
  return f.module ?? '-'
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 3) + '...' : text
}
