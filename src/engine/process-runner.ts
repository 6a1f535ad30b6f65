import type {RunProcessRequest, RunProcessResult} from './types.js'

/**
 * Log line from a subprocess.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface for running target actions, prepare commands and test suites.
 *
 * Implementations:
 * - `ExecaProcessRunner`: spawns host processes through execa
 *
 * The runner treats every command as opaque: only the exit code and the
 * output lines are observed.
 */
export abstract class ProcessRunner {
  /**
   * Executes a command and waits for it to exit.
   * A command that cannot be spawned resolves with a non-zero exit code.
   * @param request - Command, working directory, env and cancellation
   * @param onLogLine - Callback for real-time stdout/stderr logs
   */
  abstract run(request: RunProcessRequest, onLogLine: OnLogLine): Promise<RunProcessResult>
}
