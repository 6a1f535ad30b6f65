import type {ExecutionResult} from './types.js'

export class RiggerError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'RiggerError'
  }

  get transient(): boolean {
    return false
  }
}

// -- Configuration errors ----------------------------------------------------

export class ConfigError extends RiggerError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ConfigError'
  }
}

export class ValidationError extends ConfigError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

export class UnknownTargetError extends ConfigError {
  constructor(
    readonly targetId: string,
    referencedBy?: string,
    options?: {cause?: unknown}
  ) {
    super(
      'UNKNOWN_TARGET',
      referencedBy
        ? `Target '${referencedBy}' depends on unknown target '${targetId}'`
        : `Unknown target '${targetId}'`,
      options
    )
    this.name = 'UnknownTargetError'
  }
}

export class DependencyCycleError extends ConfigError {
  constructor(
    readonly members: string[],
    options?: {cause?: unknown}
  ) {
    super('DEPENDENCY_CYCLE', `Dependency cycle: ${members.join(' → ')}`, options)
    this.name = 'DependencyCycleError'
  }
}

export class MissingInputError extends ConfigError {
  constructor(
    readonly targetId: string,
    readonly path: string,
    options?: {cause?: unknown}
  ) {
    super('MISSING_INPUT', `Target '${targetId}': input '${path}' does not exist and no target produces it`, options)
    this.name = 'MissingInputError'
  }
}

export class UnknownPipelineError extends ConfigError {
  constructor(
    readonly pipelineId: string,
    options?: {cause?: unknown}
  ) {
    super('UNKNOWN_PIPELINE', `Unknown pipeline '${pipelineId}'`, options)
    this.name = 'UnknownPipelineError'
  }
}

// -- Build errors ------------------------------------------------------------

export class BuildError extends RiggerError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'BuildError'
  }
}

export class ActionExecutionError extends BuildError {
  constructor(
    readonly targetId: string,
    readonly exitCode: number,
    readonly results: ExecutionResult[] = [],
    readonly notAttempted: string[] = [],
    options?: {cause?: unknown}
  ) {
    const pending = notAttempted.length > 0 ? ` (not attempted: ${notAttempted.join(', ')})` : ''
    super('ACTION_FAILED', `Target ${targetId} failed with exit code ${exitCode}${pending}`, options)
    this.name = 'ActionExecutionError'
  }
}

export class MissingOutputError extends BuildError {
  constructor(
    readonly targetId: string,
    readonly path: string,
    options?: {cause?: unknown}
  ) {
    super('MISSING_OUTPUT', `Target ${targetId} succeeded but did not produce '${path}'`, options)
    this.name = 'MissingOutputError'
  }
}

// -- Service errors ----------------------------------------------------------

export class ServiceError extends RiggerError {
  constructor(
    code: string,
    readonly serviceId: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(code, message, options)
    this.name = 'ServiceError'
  }
}

export class RuntimeNotAvailableError extends RiggerError {
  constructor(options?: {cause?: unknown}) {
    super('RUNTIME_NOT_AVAILABLE', 'Docker CLI not found. Please install Docker.', options)
    this.name = 'RuntimeNotAvailableError'
  }

  override get transient(): boolean {
    return true
  }
}

export class ServiceStartError extends ServiceError {
  constructor(serviceId: string, message?: string, options?: {cause?: unknown}) {
    super('SERVICE_START_FAILED', serviceId, message ?? `Service ${serviceId} failed to start`, options)
    this.name = 'ServiceStartError'
  }
}

export class ServiceNameCollisionError extends ServiceStartError {
  constructor(
    serviceId: string,
    readonly containerName: string,
    readonly ownerPid: number,
    options?: {cause?: unknown}
  ) {
    super(serviceId, `Service ${serviceId}: container name '${containerName}' is held by running process ${ownerPid}`, options)
    this.name = 'ServiceNameCollisionError'
  }
}

export class ReadinessTimeoutError extends ServiceError {
  constructor(
    serviceId: string,
    readonly elapsedMs: number,
    readonly attempts: number,
    options?: {cause?: unknown}
  ) {
    super('READINESS_TIMEOUT', serviceId, `Service ${serviceId} not ready after ${elapsedMs}ms (${attempts} attempt${attempts === 1 ? '' : 's'})`, options)
    this.name = 'ReadinessTimeoutError'
  }
}

export class TeardownError extends ServiceError {
  constructor(serviceId: string, options?: {cause?: unknown}) {
    super('TEARDOWN_FAILED', serviceId, `Failed to tear down service ${serviceId}`, options)
    this.name = 'TeardownError'
  }
}

// -- Test errors -------------------------------------------------------------

export class ConsumerFailureError extends RiggerError {
  constructor(
    readonly suiteId: string,
    readonly exitCode: number,
    options?: {cause?: unknown}
  ) {
    super('CONSUMER_FAILED', `Suite ${suiteId} failed with exit code ${exitCode}`, options)
    this.name = 'ConsumerFailureError'
  }
}

// -- Deadline ----------------------------------------------------------------

export class PipelineTimeoutError extends RiggerError {
  constructor(
    readonly timeoutMs?: number,
    options?: {cause?: unknown}
  ) {
    super('PIPELINE_TIMEOUT', timeoutMs === undefined ? 'Pipeline deadline exceeded' : `Pipeline exceeded deadline of ${timeoutMs}ms`, options)
    this.name = 'PipelineTimeoutError'
  }
}

export class PipelineCancelledError extends RiggerError {
  constructor(
    readonly signal: string,
    options?: {cause?: unknown}
  ) {
    super('PIPELINE_CANCELLED', `Pipeline cancelled by ${signal}`, options)
    this.name = 'PipelineCancelledError'
  }
}
