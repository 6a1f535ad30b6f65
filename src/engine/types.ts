/**
 * Request to run an opaque subprocess (target action, test suite, prepare command).
 */
export type RunProcessRequest = {
  /** Command and arguments to execute */
  cmd: string[];
  /** Absolute working directory */
  cwd: string;
  /** Variables added on top of the inherited environment */
  env?: Record<string, string>;
  /** Aborting the signal kills the process */
  signal?: AbortSignal;
}

/**
 * Result of a subprocess execution.
 */
export type RunProcessResult = {
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  /** Execution start timestamp */
  startedAt: Date;
  /** Execution end timestamp */
  finishedAt: Date;
  /** Error message if the process could not run or was killed */
  error?: string;
}

/**
 * Request to start a detached service container.
 */
export type StartServiceRequest = {
  /** Container name, unique per project and service */
  name: string;
  /** Image to run (e.g., postgres:16-alpine) */
  image: string;
  /** Environment variables to pass to the container */
  env?: Record<string, string>;
  /** Published ports (`host:container`) */
  ports?: string[];
  /** Arguments appended after the image */
  args?: string[];
  /** Container labels (`docker run --label`), for inspecting containers by hand */
  labels?: Record<string, string>;
}

/**
 * Single readiness check against a running service.
 */
export type ProbeServiceRequest = {
  /** Container name */
  name: string;
  /** Command executed inside the container; exit 0 means ready */
  cmd: string[];
  /** Ceiling for this attempt in milliseconds */
  timeoutMs: number;
}
