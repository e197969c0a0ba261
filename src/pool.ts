/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Workers pull the next index from a shared cursor, so no item is handed
 * out twice, and write their result into a slot array: the returned list
 * is in item order whatever the completion order.
 *
 * Once `signal` is aborted no further items are pulled; `onSkipped`
 * produces the result for every item that never started. `worker` is
 * expected to settle every item itself; a rejection aborts the whole run.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  onSkipped: (item: T, index: number) => R,
  signal?: AbortSignal
): Promise<R[]> {
  const size = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length))
  const slots = new Array<{ result: R } | undefined>(items.length)
  let cursor = 0

  const next = async (): Promise<void> => {
    while (cursor < items.length && !signal?.aborted) {
      const index = cursor++
      slots[index] = { result: await worker(items[index], index) }
    }
  }

  await Promise.all(Array.from({ length: size }, next))

  return items.map((item, index) => {
    const slot = slots[index]
    return slot ? slot.result : onSkipped(item, index)
  })
}
