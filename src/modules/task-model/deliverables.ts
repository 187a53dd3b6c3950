/**
 * Deliverable preparation: validates outliner output, orders it so producers
 * come before consumers and assigns plan-scoped numbers 1..n.
 */

import { ValidationError } from '../../core/errors.js'
import {
  DeliverableDraftSchema,
  type Deliverable,
  type DeliverableDraft,
} from '../../persistence/schemas/plan-records.js'
import { orderByDependencies } from './dependency-resolver.js'

export interface PrepareDeliverablesOptions {
  /** Domain assigned to drafts that carry none */
  defaultDomain: string
  /** Profiles assigned to drafts that carry none */
  defaultProfiles: readonly string[]
}

/**
 * Validate and number a set of deliverable drafts.
 *
 * @throws {ValidationError} on malformed drafts, duplicate keys, dangling references or an empty set
 * @throws {DependencyCycleError} when drafts depend on each other cyclically
 */
export function prepareDeliverables(
  drafts: readonly unknown[],
  options: PrepareDeliverablesOptions,
): Deliverable[] {
  if (drafts.length === 0) {
    throw new ValidationError('Outline produced no deliverables')
  }

  const parsed: DeliverableDraft[] = drafts.map((raw, index) => {
    const result = DeliverableDraftSchema.safeParse(raw)
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
      throw new ValidationError(`Deliverable draft ${String(index)} is malformed: ${issues.join('; ')}`, {
        index,
        issues,
      })
    }
    return result.data
  })

  const byKey = new Map<string, DeliverableDraft>()
  for (const draft of parsed) {
    if (byKey.has(draft.key)) {
      throw new ValidationError(`Duplicate deliverable key "${draft.key}"`, { key: draft.key })
    }
    byKey.set(draft.key, draft)
  }

  const graph = new Map(parsed.map((d) => [d.key, d.depends_on]))
  const orderedKeys = orderByDependencies(graph, 'Deliverable')

  const numberOf = new Map<string, number>()
  orderedKeys.forEach((key, index) => numberOf.set(key, index + 1))

  return orderedKeys.map((key, index) => {
    const draft = byKey.get(key)
    if (draft === undefined) {
      throw new ValidationError(`Deliverable "${key}" vanished during ordering`)
    }
    return {
      number: index + 1,
      title: draft.title,
      description: draft.description,
      change_type: draft.change_type,
      domain: draft.domain ?? options.defaultDomain,
      module: draft.module,
      affected_files: draft.affected_files,
      profiles: draft.profiles ?? [...options.defaultProfiles],
      skills: draft.skills,
      depends_on: [...new Set(draft.depends_on)].map((dep) => numberOf.get(dep) ?? 0).sort((a, b) => a - b),
    }
  })
}
