import pino from 'pino'

/** Reference to a target, service, suite or command for display and keying purposes. */
export type UnitRef = {
  id: string;
  displayName: string;
}

/** Stages of a pipeline, in execution order. */
export type StageName = 'clean' | 'build' | 'services' | 'test'

/** Lifecycle of one provisioned service. */
export type ServiceState = 'NOT_STARTED' | 'STARTING' | 'READY' | 'FAILED_TO_START' | 'TEARING_DOWN' | 'STOPPED'

/**
 * Discriminated union of run events.
 *
 * Lifecycle:
 * 1. RUN_START - Pipeline (or standalone build) begins
 * 2. For each stage: STAGE_START, then STAGE_FINISHED or STAGE_FAILED
 *    - build: TARGET_SKIPPED (fresh) | TARGET_WOULD_RUN (plan) |
 *      TARGET_STARTING then TARGET_FINISHED or TARGET_FAILED
 *    - services: SERVICE_STATE transitions, SERVICE_PROBE per readiness attempt,
 *      SERVICE_TEARDOWN_FAILED when removal fails (never fatal)
 *    - test: COMMAND_STARTING then COMMAND_FINISHED or COMMAND_FAILED
 *      for prepare commands and suites
 *    - LOG - Subprocess output line (stdout/stderr)
 * 3. RUN_FINISHED - Every stage succeeded
 *    OR RUN_FAILED - A stage failed; later stages never ran
 */
export type RunStartEvent = {
  event: 'RUN_START';
  runId: string;
  pipelineName: string;
  label?: string;
}

export type StageStartEvent = {
  event: 'STAGE_START';
  runId: string;
  stage: StageName;
}

export type StageFinishedEvent = {
  event: 'STAGE_FINISHED';
  runId: string;
  stage: StageName;
  durationMs: number;
}

export type StageFailedEvent = {
  event: 'STAGE_FAILED';
  runId: string;
  stage: StageName;
  message: string;
}

export type TargetSkippedEvent = {
  event: 'TARGET_SKIPPED';
  runId: string;
  target: UnitRef;
  reason: 'fresh';
}

export type TargetWouldRunEvent = {
  event: 'TARGET_WOULD_RUN';
  runId: string;
  target: UnitRef;
}

export type TargetStartingEvent = {
  event: 'TARGET_STARTING';
  runId: string;
  target: UnitRef;
}

export type TargetFinishedEvent = {
  event: 'TARGET_FINISHED';
  runId: string;
  target: UnitRef;
  durationMs: number;
}

export type TargetFailedEvent = {
  event: 'TARGET_FAILED';
  runId: string;
  target: UnitRef;
  exitCode: number;
  /** Why the process failed, when it could not run or was killed. */
  error?: string;
}

export type ServiceStateEvent = {
  event: 'SERVICE_STATE';
  runId: string;
  service: UnitRef;
  state: ServiceState;
  containerName: string;
}

export type ServiceProbeEvent = {
  event: 'SERVICE_PROBE';
  runId: string;
  service: UnitRef;
  attempt: number;
  ready: boolean;
}

export type ServiceTeardownFailedEvent = {
  event: 'SERVICE_TEARDOWN_FAILED';
  runId: string;
  service: UnitRef;
  message: string;
}

export type CommandStartingEvent = {
  event: 'COMMAND_STARTING';
  runId: string;
  kind: 'prepare' | 'suite';
  command: UnitRef;
}

export type CommandFinishedEvent = {
  event: 'COMMAND_FINISHED';
  runId: string;
  kind: 'prepare' | 'suite';
  command: UnitRef;
  durationMs: number;
}

export type CommandFailedEvent = {
  event: 'COMMAND_FAILED';
  runId: string;
  kind: 'prepare' | 'suite';
  command: UnitRef;
  exitCode: number;
  error?: string;
}

export type LogEvent = {
  event: 'LOG';
  runId: string;
  source: UnitRef;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type RunFinishedEvent = {
  event: 'RUN_FINISHED';
  runId: string;
  durationMs: number;
}

export type RunFailedEvent = {
  event: 'RUN_FAILED';
  runId: string;
  stage?: StageName;
  message: string;
  exitCode: number;
}

export type RunEvent =
  | RunStartEvent
  | StageStartEvent
  | StageFinishedEvent
  | StageFailedEvent
  | TargetSkippedEvent
  | TargetWouldRunEvent
  | TargetStartingEvent
  | TargetFinishedEvent
  | TargetFailedEvent
  | ServiceStateEvent
  | ServiceProbeEvent
  | ServiceTeardownFailedEvent
  | CommandStartingEvent
  | CommandFinishedEvent
  | CommandFailedEvent
  | LogEvent
  | RunFinishedEvent
  | RunFailedEvent

/**
 * Interface for reporting run events.
 */
export type Reporter = {
  emit(event: RunEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: pino.Logger

  constructor(options?: {logger?: pino.Logger}) {
    this.logger = options?.logger ?? pino({level: 'info'})
  }

  emit(event: RunEvent): void {
    switch (event.event) {
      case 'SERVICE_TEARDOWN_FAILED': {
        this.logger.warn(event)
        break
      }

      case 'STAGE_FAILED':
      case 'TARGET_FAILED':
      case 'COMMAND_FAILED':
      case 'RUN_FAILED': {
        this.logger.error(event)
        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }
}
