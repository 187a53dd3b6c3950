/**
 * Dependency resolver for deliverable and task graphs.
 *
 * Provides:
 *  - Cycle detection using DFS with visited/inStack sets
 *  - Dangling reference detection for missing dependency ids
 *  - Stable topological ordering (producers before consumers)
 *
 * Graphs are given as an ordered map of node id → ids it depends on. The map's
 * insertion order is the tie-break for ordering.
 */

import { DependencyCycleError, ValidationError } from '../../core/errors.js'

/** Node id → ids of the nodes it depends on */
export type DependencyGraph = ReadonlyMap<string, readonly string[]>

// ---------------------------------------------------------------------------
// detectCycle
// ---------------------------------------------------------------------------

/**
 * Detect a cycle in the dependency graph using depth-first search.
 *
 * @returns The cycle path (e.g. ['a', 'b', 'a']), or null if no cycle is detected
 */
export function detectCycle(graph: DependencyGraph): string[] | null {
  const visited = new Set<string>()
  const inStack = new Set<string>()

  function dfs(nodeId: string, path: string[]): string[] | null {
    visited.add(nodeId)
    inStack.add(nodeId)

    for (const dep of graph.get(nodeId) ?? []) {
      if (inStack.has(dep)) {
        const cycleStart = path.indexOf(dep)
        return [...path.slice(cycleStart), dep]
      }
      if (!visited.has(dep)) {
        const cycle = dfs(dep, [...path, dep])
        if (cycle) return cycle
      }
    }

    inStack.delete(nodeId)
    return null
  }

  for (const id of graph.keys()) {
    if (!visited.has(id)) {
      const cycle = dfs(id, [id])
      if (cycle) return cycle
    }
  }
  return null
}

// ---------------------------------------------------------------------------
// validateDependencies
// ---------------------------------------------------------------------------

/**
 * Validate that all dependency references point to existing nodes.
 *
 * @returns Error messages for missing or self dependencies (empty if all valid)
 */
export function validateDependencies(graph: DependencyGraph, label = 'Node'): string[] {
  const errors: string[] = []
  for (const [id, deps] of graph) {
    for (const dep of deps) {
      if (dep === id) {
        errors.push(`${label} "${id}" depends on itself`)
      } else if (!graph.has(dep)) {
        errors.push(`${label} "${id}" references unknown dependency "${dep}"`)
      }
    }
  }
  return errors
}

// ---------------------------------------------------------------------------
// orderByDependencies
// ---------------------------------------------------------------------------

/**
 * Order nodes so every node follows all of its dependencies.
 *
 * Kahn's algorithm; among nodes that are ready at the same time the one that
 * came first in the graph's insertion order wins, so the result is
 * deterministic for a given input.
 *
 * @throws {ValidationError} on dangling references
 * @throws {DependencyCycleError} when the graph is cyclic
 */
export function orderByDependencies(graph: DependencyGraph, label = 'Node'): string[] {
  const errors = validateDependencies(graph, label)
  if (errors.length > 0) {
    // A self dependency is the smallest cycle
    for (const [id, deps] of graph) {
      if (deps.includes(id)) throw new DependencyCycleError([id, id])
    }
    throw new ValidationError(errors.join('; '), { errors })
  }

  const cycle = detectCycle(graph)
  if (cycle !== null) throw new DependencyCycleError(cycle)

  const position = new Map<string, number>()
  for (const id of graph.keys()) position.set(id, position.size)

  const remaining = new Map<string, number>()
  const dependents = new Map<string, string[]>()
  for (const [id, deps] of graph) {
    const unique = new Set(deps)
    remaining.set(id, unique.size)
    for (const dep of unique) {
      const list = dependents.get(dep) ?? []
      list.push(id)
      dependents.set(dep, list)
    }
  }

  const byPosition = (a: string, b: string): number => (position.get(a) ?? 0) - (position.get(b) ?? 0)
  const ready = [...graph.keys()].filter((id) => remaining.get(id) === 0)
  const ordered: string[] = []

  while (ready.length > 0) {
    ready.sort(byPosition)
    const next = ready.shift()
    if (next === undefined) break
    ordered.push(next)
    for (const dependent of dependents.get(next) ?? []) {
      const count = (remaining.get(dependent) ?? 0) - 1
      remaining.set(dependent, count)
      if (count === 0) ready.push(dependent)
    }
  }

  return ordered
}
