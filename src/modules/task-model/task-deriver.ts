/**
 * derive_tasks: expands deliverables into tasks, one task per required
 * capability profile, in deliverable dependency order.
 */

import type { Deliverable, Task, TaskStep } from '../../persistence/schemas/plan-records.js'
import { orderByDependencies } from './dependency-resolver.js'
import type { DeriveTasksOptions } from './types.js'

/**
 * Sort a deliverable's profiles by the configured profile order.
 * Profiles missing from the order keep their relative position, after the known ones.
 */
export function orderProfiles(profiles: readonly string[], profileOrder: readonly string[]): string[] {
  const rank = (p: string): number => {
    const idx = profileOrder.indexOf(p)
    return idx === -1 ? profileOrder.length : idx
  }
  return [...new Set(profiles)]
    .map((profile, index) => ({ profile, index }))
    .sort((a, b) => rank(a.profile) - rank(b.profile) || a.index - b.index)
    .map(({ profile }) => profile)
}

/** One step per affected file; a deliverable without files gets a single step on its module */
function stepsFor(deliverable: Deliverable): TaskStep[] {
  const targets = deliverable.affected_files.length > 0 ? deliverable.affected_files : [deliverable.module]
  return targets.map((target, index): TaskStep => ({ number: index + 1, target, outcome: 'pending' }))
}

/**
 * Derive tasks from deliverables.
 *
 * Every task of a deliverable depends on all tasks of the deliverables it
 * depends on; a later profile of the same deliverable depends on the earlier
 * ones. Task numbers follow creation order, so a dependency's tasks always
 * carry lower numbers than its dependents'.
 *
 * @throws {DependencyCycleError} if deliverables reference each other cyclically
 * @throws {ValidationError} if a deliverable references an unknown deliverable
 */
export function deriveTasks(deliverables: readonly Deliverable[], options: DeriveTasksOptions): Task[] {
  const byNumber = new Map(deliverables.map((d) => [String(d.number), d]))
  const graph = new Map(deliverables.map((d) => [String(d.number), d.depends_on.map(String)]))
  const order = orderByDependencies(graph, 'Deliverable')

  const tasksOf = new Map<number, number[]>()
  const tasks: Task[] = []
  let next = options.startNumber ?? 1

  for (const key of order) {
    const deliverable = byNumber.get(key)
    if (deliverable === undefined) continue

    const upstream = deliverable.depends_on.flatMap((dep) => tasksOf.get(dep) ?? [])
    const own: number[] = []

    for (const profile of orderProfiles(deliverable.profiles, options.profileOrder)) {
      const number = next++
      tasks.push({
        number,
        title: `${deliverable.title} [${profile}]`,
        deliverable: deliverable.number,
        origin: 'normal',
        finding_ids: [],
        status: 'pending',
        profile,
        domain: deliverable.domain,
        module: deliverable.module,
        executor: options.executorFor(deliverable, profile),
        skills: [...deliverable.skills],
        steps: stepsFor(deliverable),
        depends_on: [...upstream, ...own],
        created_at: options.now,
        updated_at: options.now,
      })
      own.push(number)
    }

    tasksOf.set(deliverable.number, own)
  }

  return tasks
}
