/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 *
 * Once `signal` is aborted no further items are started; calls already in
 * flight run to completion. Returns the number of items that were started.
 * A worker that throws rejects the whole pool, so callers contain their own
 * failures.
 */
export async function mapLimit<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<number> {
  if (items.length === 0) {
    return 0
  }

  const concurrency = Math.max(1, Math.min(limit, items.length))
  let next = 0

  const runners = Array.from({ length: concurrency }, async () => {
    while (next < items.length && !signal?.aborted) {
      const index = next
      next += 1
      await worker(items[index], index)
    }
  })

  await Promise.all(runners)
  return next
}
