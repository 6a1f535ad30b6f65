import {normalize} from 'node:path'
import {DependencyCycleError, UnknownTargetError} from '../errors.js'
import type {Target} from '../types.js'

/** Maps each targetId to its set of dependency targetIds. */
export type TargetGraph = Map<string, Set<string>>

/**
 * Maps each declared output path (normalized, project-relative) to the target producing it.
 */
export function producers(targets: Target[]): Map<string, string> {
  const result = new Map<string, string>()
  for (const target of targets) {
    for (const output of target.outputs) {
      result.set(normalize(output), target.id)
    }
  }

  return result
}

/**
 * Build a dependency graph from targets.
 * `{target}` inputs are explicit edges; a file input that another target
 * declares as an output is an implicit edge to that target.
 */
export function buildGraph(targets: Target[]): TargetGraph {
  const producedBy = producers(targets)
  const graph: TargetGraph = new Map()
  for (const target of targets) {
    const deps = new Set<string>()
    for (const input of target.inputs) {
      if (input.kind === 'target') {
        deps.add(input.id)
        continue
      }

      const producer = producedBy.get(normalize(input.path))
      if (producer !== undefined && producer !== target.id) {
        deps.add(producer)
      }
    }

    graph.set(target.id, deps)
  }

  return graph
}

/** Validate graph: check for unknown refs and cycles. */
export function validateGraph(graph: TargetGraph): void {
  for (const [targetId, deps] of graph) {
    for (const dep of deps) {
      if (!graph.has(dep)) {
        throw new UnknownTargetError(dep, targetId)
      }
    }
  }

  const cycle = findCycle(graph)
  if (cycle) {
    throw new DependencyCycleError(cycle)
  }
}

/**
 * Depth-first search for a cycle.
 * Returns its members with the first one repeated at the end (`a → b → a`).
 */
export function findCycle(graph: TargetGraph): string[] | undefined {
  const done = new Set<string>()
  const path: string[] = []
  const onPath = new Set<string>()

  const visit = (id: string): string[] | undefined => {
    if (onPath.has(id)) {
      return [...path.slice(path.indexOf(id)), id]
    }

    if (done.has(id)) {
      return undefined
    }

    path.push(id)
    onPath.add(id)
    for (const dep of graph.get(id) ?? []) {
      const cycle = visit(dep)
      if (cycle) {
        return cycle
      }
    }

    path.pop()
    onPath.delete(id)
    done.add(id)
    return undefined
  }

  for (const id of graph.keys()) {
    const cycle = visit(id)
    if (cycle) {
      return cycle
    }
  }

  return undefined
}

/** Compute in-degree for each node (number of existing deps). */
function computeInDegree(graph: TargetGraph): Map<string, number> {
  const inDeg = new Map<string, number>()
  for (const [id, deps] of graph) {
    let count = 0
    for (const dep of deps) {
      if (graph.has(dep)) {
        count++
      }
    }

    inDeg.set(id, count)
  }

  return inDeg
}

/**
 * Return targets grouped by topological level (parallelizable groups).
 * Within a level, targets keep their declaration order.
 */
export function topologicalLevels(graph: TargetGraph): string[][] {
  const inDeg = computeInDegree(graph)
  const levels: string[][] = []
  const remaining = new Set(graph.keys())

  while (remaining.size > 0) {
    const level: string[] = []
    for (const id of remaining) {
      if (inDeg.get(id) === 0) {
        level.push(id)
      }
    }

    if (level.length === 0) {
      break // Cycle — should not happen after validateGraph
    }

    levels.push(level)

    for (const id of level) {
      remaining.delete(id)
      for (const [nodeId, deps] of graph) {
        if (deps.has(id) && remaining.has(nodeId)) {
          inDeg.set(nodeId, (inDeg.get(nodeId) ?? 1) - 1)
        }
      }
    }
  }

  return levels
}

/** BFS backward from targets to collect all ancestors + targets. */
export function subgraph(graph: TargetGraph, targets: string[]): Set<string> {
  const result = new Set<string>()
  const queue = [...targets]

  for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
    if (result.has(current)) {
      continue
    }

    result.add(current)
    const deps = graph.get(current)
    if (deps) {
      for (const dep of deps) {
        if (!result.has(dep)) {
          queue.push(dep)
        }
      }
    }
  }

  return result
}

/** Return targets that no other target depends on (leaf/terminal nodes). */
export function leafNodes(graph: TargetGraph): string[] {
  const depended = new Set<string>()
  for (const deps of graph.values()) {
    for (const dep of deps) {
      depended.add(dep)
    }
  }

  const leaves: string[] = []
  for (const id of graph.keys()) {
    if (!depended.has(id)) {
      leaves.push(id)
    }
  }

  return leaves
}
