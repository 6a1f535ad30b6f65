import type {ContainerRuntime} from '../engine/index.js'
import {ServiceStartError, TeardownError} from '../errors.js'
import type {ServiceSpec} from '../types.js'
import {raceAbort, throwIfAborted, type PipelineContext} from './context.js'
import {defaultProbeAttemptTimeoutMs, waitUntilReady} from './readiness.js'
import type {ServiceState, UnitRef} from './reporter.js'
import {ServiceLock} from './service-lock.js'

type ServiceHandle = {
  spec: ServiceSpec;
  ref: UnitRef;
  containerName: string;
  lock?: ServiceLock;
}

/**
 * Scoped provisioning of ephemeral services.
 *
 * ## Lifecycle (per service)
 *
 * NOT_STARTED → STARTING → READY | FAILED_TO_START → TEARING_DOWN → STOPPED
 *
 * - Services start one by one in declaration order; each must be ready
 *   before the next starts.
 * - The consumer runs exactly once, and only when every service is ready.
 * - Every service that reached STARTING is torn down in reverse start order,
 *   whether the consumer succeeded, failed, or the deadline fired.
 * - Teardown failures are reported and never replace the original error.
 */
export class ServiceLifecycle {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly projectId: string
  ) {}

  /** Container name for a service, unique per project. */
  containerName(spec: ServiceSpec): string {
    return `${this.projectId}-${spec.id}`
  }

  async withServices<T>(
    specs: ServiceSpec[],
    consumer: (ctx: PipelineContext) => Promise<T>,
    ctx: PipelineContext
  ): Promise<T> {
    const started: ServiceHandle[] = []

    try {
      if (specs.length > 0) {
        await this.runtime.check()
      }

      for (const spec of specs) {
        throwIfAborted(ctx.signal)
        const handle: ServiceHandle = {
          spec,
          ref: {id: spec.id, displayName: spec.name ?? spec.id},
          containerName: this.containerName(spec)
        }
        handle.lock = await ServiceLock.acquire(ctx.root, handle.containerName, {serviceId: spec.id, runId: ctx.runId})
        started.push(handle)
        await this.provision(handle, ctx)
      }

      throwIfAborted(ctx.signal)
      return await raceAbort(consumer(ctx), ctx.signal)
    } finally {
      await this.teardown(started, ctx)
    }
  }

  private async provision(handle: ServiceHandle, ctx: PipelineContext): Promise<void> {
    const {spec} = handle
    this.transition(handle, 'STARTING', ctx)

    try {
      await this.runtime.start({
        name: handle.containerName,
        image: spec.image,
        env: spec.env,
        ports: spec.ports,
        args: spec.args,
        labels: {'rigger.project': this.projectId, 'rigger.service': spec.id, 'rigger.run': ctx.runId}
      })
    } catch (error) {
      this.transition(handle, 'FAILED_TO_START', ctx)
      throw new ServiceStartError(spec.id, undefined, {cause: error})
    }

    const attemptTimeoutMs = spec.readiness.attemptTimeoutMs ?? defaultProbeAttemptTimeoutMs

    try {
      await waitUntilReady({
        serviceId: spec.id,
        probe: spec.readiness,
        signal: ctx.signal,
        check: async remainingMs => this.runtime.probe({
          name: handle.containerName,
          cmd: spec.readiness.cmd,
          timeoutMs: Math.max(1, Math.floor(Math.min(attemptTimeoutMs, remainingMs)))
        }),
        onAttempt(attempt, ready) {
          ctx.reporter.emit({event: 'SERVICE_PROBE', runId: ctx.runId, service: handle.ref, attempt, ready})
        }
      })
    } catch (error) {
      this.transition(handle, 'FAILED_TO_START', ctx)
      throw error
    }

    this.transition(handle, 'READY', ctx)
  }

  private async teardown(started: ServiceHandle[], ctx: PipelineContext): Promise<void> {
    for (const handle of [...started].reverse()) {
      this.transition(handle, 'TEARING_DOWN', ctx)

      try {
        await this.runtime.stop(handle.containerName)
      } catch (error) {
        this.reportTeardownFailure(handle, new TeardownError(handle.spec.id, {cause: error}), ctx)
      }

      try {
        await handle.lock?.release()
      } catch (error) {
        this.reportTeardownFailure(handle, new TeardownError(handle.spec.id, {cause: error}), ctx)
      }

      this.transition(handle, 'STOPPED', ctx)
    }
  }

  private reportTeardownFailure(handle: ServiceHandle, error: TeardownError, ctx: PipelineContext): void {
    const detail = error.cause instanceof Error ? `: ${error.cause.message}` : ''
    ctx.reporter.emit({event: 'SERVICE_TEARDOWN_FAILED', runId: ctx.runId, service: handle.ref, message: `${error.message}${detail}`})
  }

  private transition(handle: ServiceHandle, state: ServiceState, ctx: PipelineContext): void {
    ctx.reporter.emit({event: 'SERVICE_STATE', runId: ctx.runId, service: handle.ref, state, containerName: handle.containerName})
  }
}
