/**
 * Run `work` over `items` with at most `limit` in flight.
 * Once `stop()` returns true no new item is started; in-flight ones finish.
 */
export async function runPool<T>(
  items: T[],
  limit: number,
  stop: () => boolean,
  work: (item: T) => Promise<void>
): Promise<void> {
  let next = 0

  async function worker() {
    while (next < items.length && !stop()) {
      const item = items[next++]
      await work(item)
    }
  }

  await Promise.all(Array.from({length: Math.min(limit, items.length)}, async () => worker()))
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}
