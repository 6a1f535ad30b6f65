// ---------------------------------------------------------------------------
// Shared project domain types.
//
// Resolved from the project file by ProjectLoader; the task graph, the
// service lifecycle and the driver operate on these.
// ---------------------------------------------------------------------------

// -- Building blocks --------------------------------------------------------

/** Target input: a file path relative to the project root, or another target. */
export type TargetInput =
  | {kind: 'file'; path: string}
  | {kind: 'target'; id: string}

/**
 * Bounded readiness check, run inside the service until it exits 0.
 * The loop never outlives `timeoutMs`, nor `maxAttempts` when set.
 */
export type ReadinessProbe = {
  cmd: string[];
  /** Delay between attempts (default: 1000). */
  intervalMs?: number;
  /** Hard wall-clock ceiling for the whole wait (default: 60000). */
  timeoutMs?: number;
  maxAttempts?: number;
  /** Ceiling for a single attempt (default: 5000). */
  attemptTimeoutMs?: number;
}

// -- Resolved types ----------------------------------------------------------

/** A named build unit. Its outputs' mtimes are its only persisted state. */
export type Target = {
  id: string;
  /** Human-readable display name. Falls back to `id` when absent. */
  name?: string;
  inputs: TargetInput[];
  outputs: string[];
  cmd: string[];
  /** Working directory relative to the project root. */
  cwd?: string;
  env?: Record<string, string>;
  /** Rebuilt on every invocation (install steps and other side effects). */
  alwaysStale?: boolean;
}

/** An ephemeral container provisioned for the duration of one consumer call. */
export type ServiceSpec = {
  id: string;
  name?: string;
  image: string;
  env?: Record<string, string>;
  /** Published ports, `host:container`. */
  ports?: string[];
  /** Arguments appended after the image. */
  args?: string[];
  readiness: ReadinessProbe;
}

/** One invocation of the test executor. */
export type TestSuite = {
  id: string;
  name?: string;
  cmd: string[];
  cwd?: string;
  env?: Record<string, string>;
}

/** A named composition of clean, build, services and suites. */
export type Pipeline = {
  id: string;
  name?: string;
  clean?: boolean;
  build: string[];
  services: string[];
  /** Commands run once every service is ready, before the suites. */
  prepare: string[][];
  suites: string[];
  env?: Record<string, string>;
  /** Variables that must be set before anything runs. */
  requireEnv: string[];
  timeoutSec?: number;
}

/** A loaded project file with every reference checked. */
export type Project = {
  id: string;
  name?: string;
  /** Absolute directory of the project file. */
  root: string;
  clean: string[];
  targets: Target[];
  services: ServiceSpec[];
  suites: TestSuite[];
  pipelines: Pipeline[];
}

// -- Results -----------------------------------------------------------------

export type ExecutionStatus = 'succeeded' | 'failed' | 'skipped'

export type ExecutionResult = {
  id: string;
  kind: 'target' | 'suite' | 'prepare';
  status: ExecutionStatus;
  exitCode?: number;
  durationMs: number;
  /** True when the target was fresh and its action did not run. */
  skipped: boolean;
}
