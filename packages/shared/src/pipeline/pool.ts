/**
 * Bounded Worker Pool
 *
 * Runs tasks with at most `concurrency` in flight. Each lane pulls the next
 * task when its current one settles. The returned promise resolves only
 * after every task has settled; a rejected task never cancels its siblings.
 */

export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const settled: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        settled[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        settled[index] = { status: 'rejected', reason };
      }
    }
  };

  // NaN from an unparsable setting still gets one lane
  const limit = Number.isNaN(concurrency) ? 1 : Math.max(1, Math.floor(concurrency));
  const laneCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: laneCount }, lane));

  return settled;
}
