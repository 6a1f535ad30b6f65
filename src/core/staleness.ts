import {stat} from 'node:fs/promises'
import {normalize, resolve} from 'node:path'
import {MissingInputError} from '../errors.js'
import type {Target} from '../types.js'

/** Why a target must run, or `fresh` when it must not. */
export type StaleReason = 'always' | 'upstream' | 'missing-output' | 'outdated' | 'fresh'

export type Staleness = {
  stale: boolean;
  reason: StaleReason;
}

/**
 * Modification time in milliseconds, or undefined when the path does not exist.
 */
export async function modifiedAt(path: string): Promise<number | undefined> {
  try {
    const stats = await stat(path)
    return stats.mtimeMs
  } catch (error) {
    if (isNotFound(error)) {
      return undefined
    }

    throw error
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')
}

/**
 * Decide whether a target must run.
 *
 * Rules, first match wins:
 * - `alwaysStale` targets always run
 * - a target whose dependency will run and rewrite its outputs is stale;
 *   a dependency without outputs (an install step) changes none of its inputs
 * - a missing output makes the target stale
 * - the oldest output strictly older than the newest input makes it stale
 *
 * Inputs are the target's files and the outputs of its upstream targets.
 * A file input that is missing and not produced by any target fails the check.
 */
export async function evaluateTarget({target, root, deps, upstream, targets, producedBy}: {
  target: Target;
  root: string;
  /** Upstream target ids, explicit and implicit. */
  deps: Set<string>;
  /** Decisions already taken for upstream targets. */
  upstream: Map<string, Staleness>;
  targets: Map<string, Target>;
  /** Output path to producing target id. */
  producedBy: Map<string, string>;
}): Promise<Staleness> {
  const inputTimes: number[] = []
  let missingProducedInput = false

  for (const input of target.inputs) {
    if (input.kind !== 'file') {
      continue
    }

    const time = await modifiedAt(resolve(root, input.path))
    if (time === undefined) {
      if (!producedBy.has(normalize(input.path))) {
        throw new MissingInputError(target.id, input.path)
      }

      missingProducedInput = true
      continue
    }

    inputTimes.push(time)
  }

  if (target.alwaysStale) {
    return {stale: true, reason: 'always'}
  }

  for (const dep of deps) {
    const producesOutputs = (targets.get(dep)?.outputs.length ?? 0) > 0
    if (producesOutputs && upstream.get(dep)?.stale) {
      return {stale: true, reason: 'upstream'}
    }
  }

  const outputTimes: number[] = []
  for (const output of target.outputs) {
    const time = await modifiedAt(resolve(root, output))
    if (time === undefined) {
      return {stale: true, reason: 'missing-output'}
    }

    outputTimes.push(time)
  }

  if (missingProducedInput) {
    // Produced by a fresh target yet absent: the producer's outputs were removed under us
    return {stale: true, reason: 'outdated'}
  }

  for (const dep of deps) {
    const upstreamTarget = targets.get(dep)
    for (const output of upstreamTarget?.outputs ?? []) {
      const time = await modifiedAt(resolve(root, output))
      if (time !== undefined) {
        inputTimes.push(time)
      }
    }
  }

  if (inputTimes.length === 0 || outputTimes.length === 0) {
    return {stale: false, reason: 'fresh'}
  }

  const oldestOutput = Math.min(...outputTimes)
  const newestInput = Math.max(...inputTimes)
  return oldestOutput < newestInput
    ? {stale: true, reason: 'outdated'}
    : {stale: false, reason: 'fresh'}
}

