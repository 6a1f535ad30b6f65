import process from 'node:process'
import {execa} from 'execa'
import {RuntimeNotAvailableError} from '../errors.js'
import type {ProbeServiceRequest, StartServiceRequest} from './types.js'
import {ContainerRuntime} from './container-runtime.js'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept: service variables travel as
 * explicit `-e KEY=value` arguments, never through the CLI's own env.
 */
function dockerCliEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

/**
 * Build `docker run` arguments for a detached service container.
 */
export function buildRunArgs(request: StartServiceRequest): string[] {
  const args = ['run', '--detach', '--name', request.name]

  if (request.labels) {
    for (const [key, value] of Object.entries(request.labels)) {
      args.push('--label', `${key}=${value}`)
    }
  }

  if (request.env) {
    for (const [key, value] of Object.entries(request.env)) {
      args.push('-e', `${key}=${value}`)
    }
  }

  if (request.ports) {
    for (const port of request.ports) {
      args.push('-p', port)
    }
  }

  args.push(request.image, ...(request.args ?? []))
  return args
}

export class DockerCliRuntime extends ContainerRuntime {
  private readonly env = dockerCliEnv()

  async check(): Promise<void> {
    try {
      await execa('docker', ['--version'], {env: this.env, extendEnv: false})
    } catch (error) {
      throw new RuntimeNotAvailableError({cause: error})
    }
  }

  async start(request: StartServiceRequest): Promise<void> {
    // Leftover from a crashed run; the service lock already ruled out a live owner
    await execa('docker', ['rm', '-f', '-v', request.name], {env: this.env, extendEnv: false, reject: false})
    await execa('docker', buildRunArgs(request), {env: this.env, extendEnv: false})
  }

  async probe(request: ProbeServiceRequest): Promise<boolean> {
    const result = await execa('docker', ['exec', request.name, ...request.cmd], {
      env: this.env,
      extendEnv: false,
      reject: false,
      timeout: request.timeoutMs
    })
    return result.exitCode === 0
  }

  async stop(name: string): Promise<void> {
    await execa('docker', ['rm', '-f', '-v', name], {env: this.env, extendEnv: false})
  }
}
