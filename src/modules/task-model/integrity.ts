/**
 * Referential integrity checks across deliverables, tasks and findings.
 */

import type { Deliverable, Finding, Task } from '../../persistence/schemas/plan-records.js'

/**
 * Every task must reference an existing deliverable, or be a fix-task that
 * references at least one existing finding. Task dependencies must point at
 * existing tasks.
 *
 * @returns One message per violation (empty when consistent)
 */
export function checkReferentialIntegrity(
  deliverables: readonly Deliverable[],
  tasks: readonly Task[],
  findings: readonly Finding[],
): string[] {
  const errors: string[] = []
  const deliverableNumbers = new Set(deliverables.map((d) => d.number))
  const findingIds = new Set(findings.map((f) => f.id))
  const taskNumbers = new Set(tasks.map((t) => t.number))

  for (const task of tasks) {
    const label = `TASK-${String(task.number)}`
    if (task.origin === 'normal') {
      if (task.deliverable === null || !deliverableNumbers.has(task.deliverable)) {
        errors.push(`${label} references unknown deliverable ${String(task.deliverable)}`)
      }
    } else {
      if (task.finding_ids.length === 0) {
        errors.push(`${label} is a fix-task without findings`)
      }
      for (const id of task.finding_ids) {
        if (!findingIds.has(id)) errors.push(`${label} references unknown finding ${id}`)
      }
    }
    for (const dep of task.depends_on) {
      if (!taskNumbers.has(dep)) errors.push(`${label} depends on unknown TASK-${String(dep)}`)
    }
  }

  for (const finding of findings) {
    if (finding.fix_task !== undefined && !taskNumbers.has(finding.fix_task)) {
      errors.push(`Finding ${finding.id} references unknown TASK-${String(finding.fix_task)}`)
    }
  }

  return errors
}
