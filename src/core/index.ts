export {TaskGraph} from './task-graph.js'
export type {PlannedTarget, ExecuteOptions} from './task-graph.js'
export {ServiceLifecycle} from './service-lifecycle.js'
export {ServiceLock, locksDir} from './service-lock.js'
export type {ServiceLockInfo} from './service-lock.js'
export {Driver, exitCodeFor} from './driver.js'
export type {PipelineOutcome, DriverDependencies} from './driver.js'
export {ProjectLoader, resolveProjectFile, projectFileNames, slugify} from './project-loader.js'
export {loadEnvFiles} from './env-file.js'
export {waitUntilReady, defaultProbeIntervalMs, defaultProbeTimeoutMs, defaultProbeAttemptTimeoutMs} from './readiness.js'
export type {ReadinessResult} from './readiness.js'
export {evaluateTarget, modifiedAt} from './staleness.js'
export type {StaleReason, Staleness} from './staleness.js'
export {createContext, deadlineSignal, anySignal, raceAbort} from './context.js'
export type {PipelineContext} from './context.js'
export {ConsoleReporter} from './reporter.js'
export type {
  Reporter,
  UnitRef,
  StageName,
  ServiceState,
  RunEvent,
  RunStartEvent,
  StageStartEvent,
  StageFinishedEvent,
  StageFailedEvent,
  TargetSkippedEvent,
  TargetWouldRunEvent,
  TargetStartingEvent,
  TargetFinishedEvent,
  TargetFailedEvent,
  ServiceStateEvent,
  ServiceProbeEvent,
  ServiceTeardownFailedEvent,
  CommandStartingEvent,
  CommandFinishedEvent,
  CommandFailedEvent,
  LogEvent,
  RunFinishedEvent,
  RunFailedEvent
} from './reporter.js'
export {buildGraph, validateGraph, findCycle, topologicalLevels, subgraph, leafNodes, producers} from './dag.js'
export type {TargetGraph} from './dag.js'
export {runPool, formatDuration} from './utils.js'
