/**
 * Programmatic entry point.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {Driver, ProjectLoader, ConsoleReporter, ExecaProcessRunner, DockerCliRuntime, createContext} from 'rigger'
 *
 * const project = await new ProjectLoader().load('rigger.yaml')
 * const driver = new Driver(project, {runner: new ExecaProcessRunner(), runtime: new DockerCliRuntime()})
 *
 * const outcome = await driver.run('unit', createContext({root: project.root, reporter: new ConsoleReporter()}))
 * process.exitCode = outcome.exitCode
 * ```
 */

// Engine layer: subprocesses and containers
export {
  ProcessRunner,
  ExecaProcessRunner,
  ContainerRuntime,
  DockerCliRuntime,
  buildRunArgs,
  gitRevision,
  type LogLine,
  type OnLogLine,
  type RunProcessRequest,
  type RunProcessResult,
  type StartServiceRequest,
  type ProbeServiceRequest
} from './engine/index.js'

// Core layer: task graph, service lifecycle and pipelines
export {
  TaskGraph,
  ServiceLifecycle,
  ServiceLock,
  Driver,
  exitCodeFor,
  ProjectLoader,
  resolveProjectFile,
  loadEnvFiles,
  waitUntilReady,
  createContext,
  deadlineSignal,
  ConsoleReporter,
  buildGraph,
  validateGraph,
  topologicalLevels,
  subgraph,
  leafNodes,
  formatDuration,
  type PlannedTarget,
  type ExecuteOptions,
  type PipelineOutcome,
  type DriverDependencies,
  type PipelineContext,
  type Reporter,
  type RunEvent,
  type UnitRef,
  type StageName,
  type ServiceState,
  type StaleReason,
  type TargetGraph
} from './core/index.js'

export type {
  Target,
  TargetInput,
  ServiceSpec,
  ReadinessProbe,
  TestSuite,
  Pipeline,
  Project,
  ExecutionResult,
  ExecutionStatus
} from './types.js'

export {
  RiggerError,
  ConfigError,
  ValidationError,
  UnknownTargetError,
  DependencyCycleError,
  MissingInputError,
  UnknownPipelineError,
  BuildError,
  ActionExecutionError,
  MissingOutputError,
  ServiceError,
  RuntimeNotAvailableError,
  ServiceStartError,
  ServiceNameCollisionError,
  ReadinessTimeoutError,
  TeardownError,
  ConsumerFailureError,
  PipelineTimeoutError,
  PipelineCancelledError
} from './errors.js'
