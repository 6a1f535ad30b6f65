import {rm} from 'node:fs/promises'
import process from 'node:process'
import {resolve} from 'node:path'
import {gitRevision, type ContainerRuntime, type ProcessRunner} from '../engine/index.js'
import {
  ActionExecutionError,
  BuildError,
  ConfigError,
  ConsumerFailureError,
  PipelineCancelledError,
  PipelineTimeoutError,
  RiggerError,
  ServiceError,
  RuntimeNotAvailableError,
  UnknownPipelineError,
  ValidationError
} from '../errors.js'
import type {ExecutionResult, Pipeline, Project, ServiceSpec, TestSuite} from '../types.js'
import {abortReason, anySignal, deadlineSignal, throwIfAborted, type PipelineContext} from './context.js'
import type {StageName, UnitRef} from './reporter.js'
import {ServiceLifecycle} from './service-lifecycle.js'
import {TaskGraph, type ExecuteOptions} from './task-graph.js'

export type PipelineOutcome = {
  pipeline: string;
  status: 'succeeded' | 'failed';
  results: ExecutionResult[];
  /** Stages that completed, in order. */
  stages: StageName[];
  failedStage?: StageName;
  error?: Error;
  /** Process exit code: 0 on success, otherwise chosen by the error's family. */
  exitCode: number;
  /** Version-control label of the checkout, when available. */
  label?: string;
  durationMs: number;
}

export type DriverDependencies = {
  runner: ProcessRunner;
  runtime: ContainerRuntime;
  /** Version-control query used to label the run. */
  revision?: (root: string) => Promise<string | undefined>;
}

/** Exit code for a failure, by error family. */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) {
    return 2
  }

  if (error instanceof BuildError) {
    return 3
  }

  if (error instanceof ServiceError || error instanceof RuntimeNotAvailableError) {
    return 4
  }

  if (error instanceof ConsumerFailureError) {
    return 5
  }

  if (error instanceof PipelineTimeoutError) {
    return 124
  }

  if (error instanceof PipelineCancelledError) {
    return 130
  }

  return 1
}

/** Tracks the stage in progress and reports its boundaries. */
class StageTracker {
  current?: StageName
  readonly completed: StageName[] = []
  private startedAt = 0

  constructor(private readonly ctx: PipelineContext) {}

  enter(stage: StageName): void {
    this.current = stage
    this.startedAt = Date.now()
    this.ctx.reporter.emit({event: 'STAGE_START', runId: this.ctx.runId, stage})
  }

  leave(): void {
    if (!this.current) {
      return
    }

    this.ctx.reporter.emit({event: 'STAGE_FINISHED', runId: this.ctx.runId, stage: this.current, durationMs: Date.now() - this.startedAt})
    this.completed.push(this.current)
    this.current = undefined
  }
}

/**
 * Sequences `clean → build → services → test` for named pipelines.
 *
 * Every stage is fail-fast: the first failure stops the run, services already
 * started are torn down, and the outcome names the failed stage. The driver
 * never throws for a stage failure; callers read `outcome.exitCode`.
 */
export class Driver {
  readonly graph: TaskGraph
  readonly lifecycle: ServiceLifecycle
  private readonly services: Map<string, ServiceSpec>
  private readonly suites: Map<string, TestSuite>
  private readonly pipelines: Map<string, Pipeline>

  constructor(
    readonly project: Project,
    private readonly deps: DriverDependencies
  ) {
    this.graph = new TaskGraph(project.targets, project.root, deps.runner)
    this.lifecycle = new ServiceLifecycle(deps.runtime, project.id)
    this.services = new Map(project.services.map(s => [s.id, s]))
    this.suites = new Map(project.suites.map(s => [s.id, s]))
    this.pipelines = new Map(project.pipelines.map(p => [p.id, p]))
  }

  get pipelineIds(): string[] {
    return [...this.pipelines.keys()]
  }

  /** Runs a named pipeline. */
  async run(pipelineId: string, ctx: PipelineContext, options?: ExecuteOptions): Promise<PipelineOutcome> {
    const pipeline = this.pipelines.get(pipelineId)
    if (!pipeline) {
      return this.fail(pipelineId, ctx, new StageTracker(ctx), [], Date.now(), new UnknownPipelineError(pipelineId))
    }

    const runCtx: PipelineContext = {
      ...ctx,
      env: {...ctx.env, ...pipeline.env},
      signal: anySignal([ctx.signal, pipeline.timeoutSec ? deadlineSignal(pipeline.timeoutSec * 1000) : undefined])
    }

    return this.sequence(pipeline.name ?? pipeline.id, runCtx, async (tracker, results) => {
      this.checkRequiredEnv(pipeline, runCtx)

      if (pipeline.clean) {
        tracker.enter('clean')
        await this.removeCleanPaths(runCtx)
        tracker.leave()
      }

      if (pipeline.build.length > 0) {
        tracker.enter('build')
        results.push(...await this.graph.build(pipeline.build, runCtx, options))
        tracker.leave()
      }

      const specs = pipeline.services.map(id => this.service(id))
      if (specs.length === 0) {
        results.push(...await this.test(pipeline, runCtx, tracker))
        return
      }

      tracker.enter('services')
      results.push(...await this.lifecycle.withServices(specs, async serviceCtx => {
        tracker.leave()
        return this.test(pipeline, serviceCtx, tracker)
      }, runCtx))
    })
  }

  /** Build stage alone; defaults to every leaf target. */
  async build(targets: string[] | undefined, ctx: PipelineContext, options?: ExecuteOptions & {dryRun?: boolean}): Promise<PipelineOutcome> {
    return this.sequence(options?.dryRun ? 'plan' : 'build', ctx, async (tracker, results) => {
      tracker.enter('build')
      results.push(...await this.graph.build(targets ?? this.graph.defaultTargets(), ctx, options))
      tracker.leave()
    })
  }

  /** Clean stage alone. */
  async clean(ctx: PipelineContext): Promise<PipelineOutcome> {
    return this.sequence('clean', ctx, async tracker => {
      tracker.enter('clean')
      await this.removeCleanPaths(ctx)
      tracker.leave()
    })
  }

  private async sequence(
    name: string,
    ctx: PipelineContext,
    stages: (tracker: StageTracker, results: ExecutionResult[]) => Promise<void>
  ): Promise<PipelineOutcome> {
    const startedAt = Date.now()
    const tracker = new StageTracker(ctx)
    const results: ExecutionResult[] = []
    const label = await (this.deps.revision ?? gitRevision)(ctx.root)

    ctx.reporter.emit({event: 'RUN_START', runId: ctx.runId, pipelineName: name, label})

    try {
      await stages(tracker, results)
    } catch (error) {
      return this.fail(name, ctx, tracker, results, startedAt, error, label)
    }

    const durationMs = Date.now() - startedAt
    ctx.reporter.emit({event: 'RUN_FINISHED', runId: ctx.runId, durationMs})
    return {pipeline: name, status: 'succeeded', results, stages: tracker.completed, exitCode: 0, label, durationMs}
  }

  private fail(
    name: string,
    ctx: PipelineContext,
    tracker: StageTracker,
    results: ExecutionResult[],
    startedAt: number,
    cause: unknown,
    label?: string
  ): PipelineOutcome {
    const error = cause instanceof Error ? cause : new RiggerError('UNKNOWN', String(cause))
    const exitCode = exitCodeFor(error)
    const stage = tracker.current
    if (error instanceof ActionExecutionError) {
      results.push(...error.results)
    }

    if (stage) {
      ctx.reporter.emit({event: 'STAGE_FAILED', runId: ctx.runId, stage, message: error.message})
    }

    ctx.reporter.emit({event: 'RUN_FAILED', runId: ctx.runId, stage, message: error.message, exitCode})
    return {
      pipeline: name,
      status: 'failed',
      results,
      stages: tracker.completed,
      failedStage: stage,
      error,
      exitCode,
      label,
      durationMs: Date.now() - startedAt
    }
  }

  private async test(pipeline: Pipeline, ctx: PipelineContext, tracker: StageTracker): Promise<ExecutionResult[]> {
    if (pipeline.prepare.length === 0 && pipeline.suites.length === 0) {
      return []
    }

    tracker.enter('test')
    const results: ExecutionResult[] = []

    for (const [index, cmd] of pipeline.prepare.entries()) {
      const command: UnitRef = {id: `prepare-${index + 1}`, displayName: cmd.join(' ')}
      results.push(await this.runCommand('prepare', command, {cmd}, ctx))
    }

    for (const suiteId of pipeline.suites) {
      const suite = this.suite(suiteId)
      const command: UnitRef = {id: suite.id, displayName: suite.name ?? suite.id}
      results.push(await this.runCommand('suite', command, suite, ctx))
    }

    tracker.leave()
    return results
  }

  private async runCommand(
    kind: 'prepare' | 'suite',
    command: UnitRef,
    spec: {cmd: string[]; cwd?: string; env?: Record<string, string>},
    ctx: PipelineContext
  ): Promise<ExecutionResult> {
    throwIfAborted(ctx.signal)
    ctx.reporter.emit({event: 'COMMAND_STARTING', runId: ctx.runId, kind, command})

    const result = await this.deps.runner.run(
      {
        cmd: spec.cmd,
        cwd: resolve(ctx.root, spec.cwd ?? '.'),
        env: {...ctx.env, ...spec.env},
        signal: ctx.signal
      },
      ({stream, line}) => {
        ctx.reporter.emit({event: 'LOG', runId: ctx.runId, source: command, stream, line})
      }
    )

    if (ctx.signal?.aborted) {
      throw abortReason(ctx.signal)
    }

    const durationMs = result.finishedAt.getTime() - result.startedAt.getTime()
    if (result.exitCode !== 0) {
      ctx.reporter.emit({event: 'COMMAND_FAILED', runId: ctx.runId, kind, command, exitCode: result.exitCode, error: result.error})
      throw new ConsumerFailureError(command.id, result.exitCode)
    }

    ctx.reporter.emit({event: 'COMMAND_FINISHED', runId: ctx.runId, kind, command, durationMs})
    return {id: command.id, kind, status: 'succeeded', exitCode: 0, durationMs, skipped: false}
  }

  /** Fails before any stage when a variable the pipeline needs is unset or empty. */
  private checkRequiredEnv(pipeline: Pipeline, ctx: PipelineContext): void {
    const missing = pipeline.requireEnv.filter(name => !ctx.env[name] && !process.env[name])
    if (missing.length > 0) {
      throw new ValidationError(`Pipeline ${pipeline.id} requires environment variable ${missing.join(', ')}`)
    }
  }

  private async removeCleanPaths(ctx: PipelineContext): Promise<void> {
    for (const path of this.project.clean) {
      throwIfAborted(ctx.signal)
      await rm(resolve(this.project.root, path), {recursive: true, force: true})
    }
  }

  private service(id: string): ServiceSpec {
    const spec = this.services.get(id)
    if (!spec) {
      throw new ValidationError(`Unknown service '${id}'`)
    }

    return spec
  }

  private suite(id: string): TestSuite {
    const suite = this.suites.get(id)
    if (!suite) {
      throw new ValidationError(`Unknown suite '${id}'`)
    }

    return suite
  }
}
