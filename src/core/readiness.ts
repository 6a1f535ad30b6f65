import {setTimeout as sleep} from 'node:timers/promises'
import {ReadinessTimeoutError} from '../errors.js'
import type {ReadinessProbe} from '../types.js'
import {abortReason, throwIfAborted} from './context.js'

export const defaultProbeIntervalMs = 1000
export const defaultProbeTimeoutMs = 60_000
export const defaultProbeAttemptTimeoutMs = 5000

export type ReadinessResult = {
  attempts: number;
  elapsedMs: number;
}

/**
 * Poll `check` at a fixed interval until it reports ready.
 *
 * The wait is always bounded: it gives up once another sleep would cross
 * `timeoutMs`, or after `maxAttempts` attempts when set, and throws
 * `ReadinessTimeoutError`. Each check receives the milliseconds left before
 * `timeoutMs` and must not run past them. A check that throws counts as a
 * failed attempt; its error becomes the timeout's cause.
 */
export async function waitUntilReady({serviceId, probe, check, signal, onAttempt, now = Date.now}: {
  serviceId: string;
  probe: ReadinessProbe;
  check: (remainingMs: number) => Promise<boolean>;
  signal?: AbortSignal;
  onAttempt?: (attempt: number, ready: boolean) => void;
  now?: () => number;
}): Promise<ReadinessResult> {
  const intervalMs = probe.intervalMs ?? defaultProbeIntervalMs
  const timeoutMs = probe.timeoutMs ?? defaultProbeTimeoutMs
  const startedAt = now()
  let lastError: unknown

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal)

    const remainingMs = timeoutMs - (now() - startedAt)
    if (attempt > 1 && remainingMs <= 0) {
      throw new ReadinessTimeoutError(serviceId, now() - startedAt, attempt - 1, {cause: lastError})
    }

    let ready: boolean
    try {
      ready = await check(remainingMs)
    } catch (error) {
      lastError = error
      ready = false
    }

    onAttempt?.(attempt, ready)
    const elapsedMs = now() - startedAt

    if (ready) {
      return {attempts: attempt, elapsedMs}
    }

    const attemptsExhausted = probe.maxAttempts !== undefined && attempt >= probe.maxAttempts
    if (attemptsExhausted || elapsedMs + intervalMs > timeoutMs) {
      throw new ReadinessTimeoutError(serviceId, elapsedMs, attempt, {cause: lastError})
    }

    try {
      await sleep(intervalMs, undefined, {signal})
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal)
      }

      throw error
    }
  }
}
