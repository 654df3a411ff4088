/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight and
 * returns results in input order.
 *
 * When a worker throws, no further items are started; the first error is
 * rethrown once every started call has settled.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const limit = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  let next = 0;
  const state: { failure: { error: unknown } | null } = { failure: null };

  const lane = async (): Promise<void> => {
    while (state.failure === null && next < items.length) {
      const index = next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  };

  const lanes: Promise<void>[] = [];
  for (let i = 0; i < limit; i++) {
    lanes.push(lane());
  }
  await Promise.all(lanes);

  if (state.failure !== null) {
    throw state.failure.error;
  }
  return results;
}
