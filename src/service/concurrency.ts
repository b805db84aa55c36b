/**
 * Run `task` over every item with at most `limit` in flight (0 = no bound)
 * and return the outputs in input order.
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workers = limit > 0 ? Math.min(limit, items.length) : items.length;
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await task(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}
