/**
 * Run `processor` over `items` with at most `concurrency` calls in flight,
 * one chunk at a time. Results keep the order of `items`.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const size = Math.max(1, Math.floor(concurrency))
  const results: R[] = []

  for (let start = 0; start < items.length; start += size) {
    const chunk = items.slice(start, start + size)
    const chunkResults = await Promise.all(chunk.map((item, i) => processor(item, start + i)))
    results.push(...chunkResults)
  }

  return results
}
