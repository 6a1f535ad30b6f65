import {randomUUID} from 'node:crypto'
import {PipelineTimeoutError} from '../errors.js'
import type {Reporter} from './reporter.js'

/**
 * Everything one pipeline run carries through the driver, the task graph and
 * the service lifecycle. Two contexts never share state, so several runs can
 * live in the same process.
 */
export type PipelineContext = {
  runId: string;
  /** Absolute project root; relative paths resolve against it. */
  root: string;
  /** Variables handed opaquely to actions, prepare commands and suites. */
  env: Record<string, string>;
  /** Aborted when the deadline passes or the run is cancelled. */
  signal?: AbortSignal;
  reporter: Reporter;
}

export function createContext(options: {
  root: string;
  reporter: Reporter;
  env?: Record<string, string>;
  signal?: AbortSignal;
}): PipelineContext {
  return {
    runId: randomUUID(),
    root: options.root,
    env: options.env ?? {},
    signal: options.signal,
    reporter: options.reporter
  }
}

/**
 * A signal aborted with a `PipelineTimeoutError` once `timeoutMs` elapses.
 * The timer does not keep the process alive.
 */
export function deadlineSignal(timeoutMs: number): AbortSignal {
  const controller = new AbortController()
  const timer = setTimeout(() => {
    controller.abort(new PipelineTimeoutError(timeoutMs))
  }, timeoutMs)
  timer.unref()
  return controller.signal
}

/** Combine optional signals; the result aborts with the reason of the first one to fire. */
export function anySignal(signals: Array<AbortSignal | undefined>): AbortSignal | undefined {
  const present = signals.filter((s): s is AbortSignal => s !== undefined)
  return present.length <= 1 ? present[0] : AbortSignal.any(present)
}

/** Throws the signal's reason, normalized to a `PipelineTimeoutError` when it is not an Error. */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal)
  }
}

export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new PipelineTimeoutError(undefined, {cause: signal.reason})
}

/**
 * Settle with `promise`, or reject with the abort reason as soon as `signal`
 * aborts, whichever comes first. Lets callers release resources on a deadline
 * even when the awaited work ignores the signal.
 */
export async function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise
  }

  let onAbort: (() => void) | undefined
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () => {
      reject(abortReason(signal))
    }

    if (signal.aborted) {
      onAbort()
    } else {
      signal.addEventListener('abort', onAbort, {once: true})
    }
  })

  try {
    return await Promise.race([promise, aborted])
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort)
    }

    // An abandoned promise may still reject; its outcome no longer matters
    void promise.catch(() => undefined)
  }
}
