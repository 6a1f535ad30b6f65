import {mkdir, mkdtemp, utimes, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {setTimeout as sleep} from 'node:timers/promises'
import {dirname, join} from 'node:path'
import {createContext, type PipelineContext} from '../core/context.js'
import {RuntimeNotAvailableError} from '../errors.js'
import type {Reporter, RunEvent} from '../core/reporter.js'
import {ContainerRuntime} from '../engine/container-runtime.js'
import {ProcessRunner, type OnLogLine} from '../engine/process-runner.js'
import type {ProbeServiceRequest, RunProcessRequest, RunProcessResult, StartServiceRequest} from '../engine/types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'rigger-test-'))
}

/**
 * Writes `path` under `root`, creating parent directories.
 * With `ageSec`, the file's mtime is set that many seconds in the past
 * (negative values move it into the future).
 */
export async function writeFixture(root: string, path: string, content = '', ageSec?: number): Promise<void> {
  const file = join(root, path)
  await mkdir(dirname(file), {recursive: true})
  await writeFile(file, content)
  if (ageSec !== undefined) {
    const time = new Date(Date.now() - (ageSec * 1000))
    await utimes(file, time, time)
  }
}

/**
 * Silent reporter.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records every event for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: RunEvent[]} {
  const events: RunEvent[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    }
  }

  return {reporter, events}
}

export function testContext(root: string, options?: {reporter?: Reporter; signal?: AbortSignal; env?: Record<string, string>}): PipelineContext {
  return createContext({root, reporter: options?.reporter ?? noopReporter, signal: options?.signal, env: options?.env})
}

type CommandHandler = (request: RunProcessRequest, onLogLine: OnLogLine) => number | Promise<number>

/**
 * In-process stand-in for subprocesses. Understands a few commands:
 * - `write <path>...` creates the files relative to `cwd`, exits 0
 * - `fail <code>` exits with `code`
 * - `say <line>` prints `line` on stdout, exits 0
 * - `complain <line>` prints `line` on stderr, exits 1
 * - `hang` resolves only when the request's signal aborts, exits 1
 * - `absent` cannot be spawned, exits 127 with an error
 * Anything else exits 0. `handlers` override by command name.
 */
export class FakeProcessRunner extends ProcessRunner {
  readonly calls: RunProcessRequest[] = []

  constructor(private readonly handlers: Record<string, CommandHandler> = {}) {
    super()
  }

  get commands(): string[] {
    return this.calls.map(c => c.cmd.join(' '))
  }

  async run(request: RunProcessRequest, onLogLine: OnLogLine): Promise<RunProcessResult> {
    this.calls.push(request)
    const startedAt = new Date()
    if (request.cmd[0] === 'absent') {
      return {exitCode: 127, startedAt, finishedAt: new Date(), error: 'spawn absent ENOENT'}
    }

    const exitCode = await this.dispatch(request, onLogLine)
    return {exitCode, startedAt, finishedAt: new Date()}
  }

  private async dispatch(request: RunProcessRequest, onLogLine: OnLogLine): Promise<number> {
    const [name, ...args] = request.cmd
    const handler = this.handlers[name]
    if (handler) {
      return handler(request, onLogLine)
    }

    switch (name) {
      case 'write': {
        for (const path of args) {
          // eslint-disable-next-line no-await-in-loop
          await writeFixture(request.cwd, path, 'built')
        }

        return 0
      }

      case 'fail': {
        return Number(args[0])
      }

      case 'say': {
        onLogLine({stream: 'stdout', line: args.join(' ')})
        return 0
      }

      case 'complain': {
        onLogLine({stream: 'stderr', line: args.join(' ')})
        return 1
      }

      case 'hang': {
        await new Promise<void>(resolve => {
          if (request.signal?.aborted) {
            resolve()
            return
          }

          request.signal?.addEventListener('abort', () => {
            resolve()
          }, {once: true})
        })
        return 1
      }

      default: {
        return 0
      }
    }
  }
}

/**
 * In-process stand-in for the container runtime. Records every call as
 * `check`, `start:<name>`, `probe:<name>` or `stop:<name>`.
 */
export class FakeContainerRuntime extends ContainerRuntime {
  readonly calls: string[] = []
  readonly started: StartServiceRequest[] = []
  readonly probes: ProbeServiceRequest[] = []
  private readonly attempts = new Map<string, number>()

  constructor(private readonly options: {
    /** Readiness per container and attempt (1-based); ready on the first attempt by default. */
    probe?: (name: string, attempt: number) => boolean | Promise<boolean>;
    /** Every probe runs until its timeout, then reports not ready. */
    hangingProbes?: boolean;
    failCheck?: boolean;
    failStart?: string[];
    failStop?: string[];
  } = {}) {
    super()
  }

  async check(): Promise<void> {
    this.calls.push('check')
    if (this.options.failCheck) {
      throw new RuntimeNotAvailableError()
    }
  }

  async start(request: StartServiceRequest): Promise<void> {
    this.calls.push(`start:${request.name}`)
    this.started.push(request)
    if (this.options.failStart?.includes(request.name)) {
      throw new Error(`cannot start ${request.name}`)
    }
  }

  async probe(request: ProbeServiceRequest): Promise<boolean> {
    this.calls.push(`probe:${request.name}`)
    this.probes.push(request)
    const attempt = (this.attempts.get(request.name) ?? 0) + 1
    this.attempts.set(request.name, attempt)
    if (this.options.hangingProbes) {
      await sleep(request.timeoutMs)
      return false
    }

    return this.options.probe ? this.options.probe(request.name, attempt) : true
  }

  async stop(name: string): Promise<void> {
    this.calls.push(`stop:${name}`)
    if (this.options.failStop?.includes(name)) {
      throw new Error(`cannot remove ${name}`)
    }
  }
}
