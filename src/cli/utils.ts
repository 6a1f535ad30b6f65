import process from 'node:process'
import {InvalidArgumentError, type Command} from 'commander'
import {ExecaProcessRunner} from '../engine/execa-process-runner.js'
import {DockerCliRuntime} from '../engine/docker-runtime.js'
import {anySignal, createContext, deadlineSignal, type PipelineContext} from '../core/context.js'
import {Driver, type PipelineOutcome} from '../core/driver.js'
import {loadEnvFiles} from '../core/env-file.js'
import {ProjectLoader, resolveProjectFile} from '../core/project-loader.js'
import {ConsoleReporter} from '../core/reporter.js'
import {PipelineCancelledError} from '../errors.js'
import type {Project} from '../types.js'
import {InteractiveReporter} from './interactive-reporter.js'

export type GlobalOptions = {
  project: string;
  json?: boolean;
  envFile: string[];
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/** Commander collector for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

/** Commander parser for counts such as `--concurrency`. */
export function positiveInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }

  return parsed
}

/** Commander parser for durations such as `--timeout`. */
export function positiveNumber(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.')
  }

  return parsed
}

export async function loadProject(cmd: Command): Promise<Project> {
  const {project} = getGlobalOptions(cmd)
  const file = await resolveProjectFile(project)
  return new ProjectLoader().load(file)
}

export type SessionOptions = {
  verbose?: boolean;
  /** Deadline for the whole run, in seconds. */
  timeout?: number;
}

/**
 * Loads the project and runs one driver call under a context wired to the
 * process: SIGINT and SIGTERM abort the run (services are still torn down)
 * and the outcome's exit code becomes the process exit code.
 */
export async function runSession(
  cmd: Command,
  options: SessionOptions,
  action: (driver: Driver, ctx: PipelineContext) => Promise<PipelineOutcome>
): Promise<void> {
  const {json, envFile} = getGlobalOptions(cmd)
  const project = await loadProject(cmd)
  const env = await loadEnvFiles(envFile)
  const driver = new Driver(project, {runner: new ExecaProcessRunner(), runtime: new DockerCliRuntime()})

  const controller = new AbortController()
  const onSignal = (signal: NodeJS.Signals) => {
    controller.abort(new PipelineCancelledError(signal))
  }

  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  try {
    const ctx = createContext({
      root: project.root,
      env,
      reporter: json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose}),
      signal: anySignal([controller.signal, options.timeout ? deadlineSignal(options.timeout * 1000) : undefined])
    })

    const outcome = await action(driver, ctx)
    process.exitCode = outcome.exitCode
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
  }
}
