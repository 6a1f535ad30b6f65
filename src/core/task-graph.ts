import {resolve} from 'node:path'
import type {ProcessRunner} from '../engine/index.js'
import {ActionExecutionError, MissingOutputError, UnknownTargetError, ValidationError} from '../errors.js'
import type {ExecutionResult, Target} from '../types.js'
import type {PipelineContext} from './context.js'
import {abortReason, throwIfAborted} from './context.js'
import {buildGraph, leafNodes, producers, subgraph, topologicalLevels, validateGraph, type TargetGraph} from './dag.js'
import type {UnitRef} from './reporter.js'
import {evaluateTarget, modifiedAt, type Staleness, type StaleReason} from './staleness.js'
import {runPool} from './utils.js'

/** A target of the requested closure with its staleness decision. */
export type PlannedTarget = {
  target: Target;
  stale: boolean;
  reason: StaleReason;
}

export type ExecuteOptions = {
  /** Max stale targets of one topological level running at once (default: 1). */
  concurrency?: number;
}

/**
 * Incremental build over a fixed set of targets.
 *
 * ## Workflow
 *
 * 1. **Validation**: unknown target references and cycles fail before anything runs
 * 2. **Planning**: the closure of the requested targets is walked in topological
 *    order and each target is checked against its outputs' mtimes
 * 3. **Execution**: stale targets run level by level; the first non-zero exit
 *    stops the build and reports the targets never attempted
 *
 * Output mtimes are the only state carried between invocations: a second
 * build with unchanged sources runs nothing.
 */
export class TaskGraph {
  private readonly targets = new Map<string, Target>()
  private readonly graph: TargetGraph

  constructor(
    targets: Target[],
    private readonly root: string,
    private readonly runner: ProcessRunner
  ) {
    for (const target of targets) {
      if (this.targets.has(target.id)) {
        throw new ValidationError(`Duplicate target id: '${target.id}'`)
      }

      if (target.outputs.length === 0 && !target.alwaysStale) {
        throw new ValidationError(`Target ${target.id}: declare outputs or mark it always stale`)
      }

      this.targets.set(target.id, target)
    }

    this.graph = buildGraph(targets)
  }

  get ids(): string[] {
    return [...this.targets.keys()]
  }

  get(id: string): Target {
    const target = this.targets.get(id)
    if (!target) {
      throw new UnknownTargetError(id)
    }

    return target
  }

  /** Targets nothing else depends on: what a bare `build` produces. */
  defaultTargets(): string[] {
    return leafNodes(this.graph)
  }

  /** Throws `UnknownTargetError` or `DependencyCycleError` for a broken graph. */
  validate(): void {
    validateGraph(this.graph)
  }

  /**
   * The whole closure of the requested targets, in execution order, with a
   * staleness decision for each.
   */
  async plan(requested: string | string[]): Promise<PlannedTarget[]> {
    const ids = typeof requested === 'string' ? [requested] : requested
    for (const id of ids) {
      this.get(id)
    }

    this.validate()

    const closure = subgraph(this.graph, ids)
    const producedBy = producers([...this.targets.values()])
    const decisions = new Map<string, Staleness>()
    const planned: PlannedTarget[] = []

    for (const id of this.levels(closure).flat()) {
      const target = this.get(id)
      const decision = await evaluateTarget({
        target,
        root: this.root,
        deps: this.graph.get(id) ?? new Set(),
        upstream: decisions,
        targets: this.targets,
        producedBy
      })
      decisions.set(id, decision)
      planned.push({target, ...decision})
    }

    return planned
  }

  /** Stale targets of the requested closure, in topological order. */
  async resolve(requested: string | string[]): Promise<Target[]> {
    const planned = await this.plan(requested)
    return planned.filter(p => p.stale).map(p => p.target)
  }

  /**
   * Runs the given targets' actions in dependency order.
   * @throws ActionExecutionError on the first non-zero exit
   * @throws MissingOutputError when an action succeeds without producing a declared output
   */
  async execute(targets: Target[], ctx: PipelineContext, options?: ExecuteOptions): Promise<ExecutionResult[]> {
    const selected = new Set(targets.map(t => t.id))
    const concurrency = options?.concurrency ?? 1
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ValidationError(`Invalid concurrency: ${concurrency} (expected a positive integer)`)
    }

    const results: ExecutionResult[] = []
    const outcome: {failure?: {targetId: string; exitCode: number}; error?: unknown} = {}
    const stopped = () => outcome.failure !== undefined || 'error' in outcome

    for (const level of this.levels(selected)) {
      await runPool(level, concurrency, stopped, async id => {
        try {
          const result = await this.runTarget(this.get(id), ctx)
          results.push(result)
          if (result.status === 'failed') {
            outcome.failure ??= {targetId: id, exitCode: result.exitCode ?? 1}
          }
        } catch (error) {
          if (!('error' in outcome)) {
            outcome.error = error
          }
        }
      })

      if (stopped()) {
        break
      }
    }

    if ('error' in outcome) {
      throw outcome.error
    }

    if (outcome.failure) {
      const attempted = new Set(results.map(r => r.id))
      const notAttempted = targets.map(t => t.id).filter(id => !attempted.has(id))
      throw new ActionExecutionError(outcome.failure.targetId, outcome.failure.exitCode, results, notAttempted)
    }

    return results
  }

  /**
   * `resolve` + `execute`, reporting fresh targets as skipped.
   * With `dryRun`, stale targets are reported and not run.
   */
  async build(requested: string | string[], ctx: PipelineContext, options?: ExecuteOptions & {dryRun?: boolean}): Promise<ExecutionResult[]> {
    const planned = await this.plan(requested)
    const results: ExecutionResult[] = []

    for (const {target, stale} of planned) {
      if (!stale) {
        ctx.reporter.emit({event: 'TARGET_SKIPPED', runId: ctx.runId, target: ref(target), reason: 'fresh'})
        results.push({id: target.id, kind: 'target', status: 'skipped', durationMs: 0, skipped: true})
      } else if (options?.dryRun) {
        ctx.reporter.emit({event: 'TARGET_WOULD_RUN', runId: ctx.runId, target: ref(target)})
      }
    }

    if (options?.dryRun) {
      return results
    }

    const executed = await this.execute(planned.filter(p => p.stale).map(p => p.target), ctx, options)
    return [...results, ...executed]
  }

  /** Topological levels restricted to `ids`, declaration order within a level. */
  private levels(ids: Set<string>): string[][] {
    return topologicalLevels(this.graph)
      .map(level => level.filter(id => ids.has(id)))
      .filter(level => level.length > 0)
  }

  private async runTarget(target: Target, ctx: PipelineContext): Promise<ExecutionResult> {
    throwIfAborted(ctx.signal)

    const targetRef = ref(target)
    ctx.reporter.emit({event: 'TARGET_STARTING', runId: ctx.runId, target: targetRef})

    const result = await this.runner.run(
      {
        cmd: target.cmd,
        cwd: resolve(this.root, target.cwd ?? '.'),
        env: {...ctx.env, ...target.env},
        signal: ctx.signal
      },
      ({stream, line}) => {
        ctx.reporter.emit({event: 'LOG', runId: ctx.runId, source: targetRef, stream, line})
      }
    )

    if (ctx.signal?.aborted) {
      throw abortReason(ctx.signal)
    }

    const durationMs = result.finishedAt.getTime() - result.startedAt.getTime()

    if (result.exitCode !== 0) {
      ctx.reporter.emit({event: 'TARGET_FAILED', runId: ctx.runId, target: targetRef, exitCode: result.exitCode, error: result.error})
      return {id: target.id, kind: 'target', status: 'failed', exitCode: result.exitCode, durationMs, skipped: false}
    }

    for (const output of target.outputs) {
      if (await modifiedAt(resolve(this.root, output)) === undefined) {
        ctx.reporter.emit({event: 'TARGET_FAILED', runId: ctx.runId, target: targetRef, exitCode: 0})
        throw new MissingOutputError(target.id, output)
      }
    }

    ctx.reporter.emit({event: 'TARGET_FINISHED', runId: ctx.runId, target: targetRef, durationMs})
    return {id: target.id, kind: 'target', status: 'succeeded', exitCode: 0, durationMs, skipped: false}
  }
}

function ref(target: Target): UnitRef {
  return {id: target.id, displayName: target.name ?? target.id}
}
