import {execa} from 'execa'
import type {RunProcessRequest, RunProcessResult} from './types.js'
import {ProcessRunner, type OnLogLine} from './process-runner.js'

/** Exit code reported when the command could not be spawned at all. */
const spawnFailureExitCode = 127

export class ExecaProcessRunner extends ProcessRunner {
  async run(request: RunProcessRequest, onLogLine: OnLogLine): Promise<RunProcessResult> {
    const startedAt = new Date()
    const [file, ...args] = request.cmd

    let exitCode = 0
    let error: string | undefined

    try {
      const proc = execa(file, args, {
        cwd: request.cwd,
        env: request.env,
        reject: false,
        cancelSignal: request.signal
      })

      await this.streamLogs(proc, onLogLine)
      const result = await proc

      if (result.exitCode !== undefined) {
        exitCode = result.exitCode
      } else if (result.failed) {
        // Killed processes have no exit code; unspawnable ones get the shell's 127
        exitCode = result.isCanceled || result.isTerminated ? 1 : spawnFailureExitCode
        error = result.shortMessage
      }
    } catch (error_) {
      exitCode = spawnFailureExitCode
      error = error_ instanceof Error ? error_.message : String(error_)
    }

    return {exitCode, startedAt, finishedAt: new Date(), error}
  }

  /**
   * Stream stdout/stderr from a subprocess via iterables.
   */
  private async streamLogs(
    proc: ReturnType<typeof execa>,
    onLogLine: OnLogLine
  ): Promise<void> {
    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        onLogLine({stream: 'stdout', line: String(line)})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        onLogLine({stream: 'stderr', line: String(line)})
      }
    })()

    await Promise.all([stdoutDone, stderrDone])
  }
}
