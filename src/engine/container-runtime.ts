import type {ProbeServiceRequest, StartServiceRequest} from './types.js'

/**
 * Abstract interface for provisioning ephemeral service containers.
 *
 * Implementations:
 * - `DockerCliRuntime`: Uses Docker CLI
 * - Future: PodmanRuntime, ComposeRuntime, etc.
 *
 * The runtime is responsible for:
 * - Starting a detached, named container
 * - Running a single readiness check inside it
 * - Force-removing it with its anonymous volumes
 *
 * Polling, bounds and ordering live in the service lifecycle, not here.
 */
export abstract class ContainerRuntime {
  /**
   * Verifies that the runtime is available and functional.
   * @throws If the runtime is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Starts a detached container. A leftover container with the same name is
   * removed first.
   * @throws If the container cannot be created or started
   */
  abstract start(request: StartServiceRequest): Promise<void>

  /**
   * Runs one readiness check.
   * @returns true when the check command exited 0
   */
  abstract probe(request: ProbeServiceRequest): Promise<boolean>

  /**
   * Force-removes the container and its anonymous volumes.
   * @throws If the runtime reports a failure
   */
  abstract stop(name: string): Promise<void>
}
