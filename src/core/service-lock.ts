import process from 'node:process'
import {link, mkdir, readFile, rm, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {randomUUID} from 'node:crypto'
import {ServiceNameCollisionError} from '../errors.js'

export type ServiceLockInfo = {
  pid: number;
  runId: string;
  serviceId: string;
  startedAt: string;
  version: 1;
}

function isLockInfo(value: unknown): value is ServiceLockInfo {
  return typeof value === 'object' && value !== null
    && 'pid' in value && Number.isInteger(value.pid)
    && 'runId' in value && typeof value.runId === 'string'
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST'
}

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch {
    return false
  }
}

/** Directory holding service locks under a project root. */
export function locksDir(root: string): string {
  return join(root, '.rigger', 'locks')
}

/**
 * Exclusive claim on a service container name.
 * Prevents two runs from provisioning (and removing) the same container.
 */
export class ServiceLock {
  /**
   * Claims `containerName` for this process.
   * Throws ServiceNameCollisionError if a live process already holds it.
   * Cleans stale locks from dead processes automatically.
   */
  static async acquire(root: string, containerName: string, info: {serviceId: string; runId: string}): Promise<ServiceLock> {
    const dir = locksDir(root)
    const lockPath = join(dir, `${containerName}.json`)

    const lockInfo: ServiceLockInfo = {
      pid: process.pid,
      runId: info.runId,
      serviceId: info.serviceId,
      startedAt: new Date().toISOString(),
      version: 1
    }

    await mkdir(dir, {recursive: true})
    // Complete content first, then an exclusive link: readers never see a partial lock
    const tmpPath = join(dir, `.${containerName}-${randomUUID()}.tmp`)
    await writeFile(tmpPath, JSON.stringify(lockInfo, null, 2), 'utf8')

    try {
      for (;;) {
        const existing = await ServiceLock.check(root, containerName)
        if (existing) {
          throw new ServiceNameCollisionError(info.serviceId, containerName, existing.pid)
        }

        try {
          await link(tmpPath, lockPath)
          return new ServiceLock(lockPath, lockInfo)
        } catch (error) {
          // Lost the race: the next check reports the winner or clears a dead one
          if (!isAlreadyExists(error)) {
            throw error
          }
        }
      }
    } finally {
      await rm(tmpPath, {force: true})
    }
  }

  /**
   * Returns the lock holder if a live process holds `containerName`.
   * Removes malformed locks and locks of dead processes.
   */
  static async check(root: string, containerName: string): Promise<ServiceLockInfo | undefined> {
    const lockPath = join(locksDir(root), `${containerName}.json`)

    let content: string
    try {
      content = await readFile(lockPath, 'utf8')
    } catch {
      return undefined
    }

    let info: unknown
    try {
      info = JSON.parse(content)
    } catch {
      info = undefined
    }

    if (!isLockInfo(info) || !isPidAlive(info.pid)) {
      await rm(lockPath, {force: true})
      return undefined
    }

    return info
  }

  private released = false

  private constructor(
    private readonly lockPath: string,
    readonly info: ServiceLockInfo
  ) {}

  async release(): Promise<void> {
    if (this.released) {
      return
    }

    this.released = true
    await rm(this.lockPath, {force: true})
  }
}
