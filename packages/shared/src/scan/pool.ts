/**
 * Run `task` over `items` with at most `concurrency` tasks in flight.
 * Results are returned in input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: ReadonlyArray<T>,
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const limit = Math.max(1, Math.trunc(concurrency));
  const results = new Array<R>(items.length);

  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      const item = items[index];
      if (item === undefined) return;
      results[index] = await task(item, index);
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, () => worker()));

  return results;
}
