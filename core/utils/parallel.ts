export const DEFAULT_PARALLEL_LIMIT = 4;

export function getParallelLimit(): number {
  const raw = process.env.RPYFMT_PARALLEL_LIMIT;
  const n = raw !== undefined ? parseInt(String(raw), 10) : NaN;
  if (!Number.isFinite(n) || n < 1) return DEFAULT_PARALLEL_LIMIT;
  return n;
}

/**
 * Run a set of async tasks with a concurrency cap. Results are placed at the
 * index of their item.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  run: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const count = items.length;
  if (count === 0) return [];
  const cap = Math.max(1, Math.min(limit || 1, count));

  const results: R[] = new Array<R>(count);
  let index = 0;

  const worker = async () => {
    while (index < count) {
      const i = index++;
      results[i] = await run(items[i], i);
    }
  };

  const workers = Array.from({ length: cap }, () => worker());
  await Promise.all(workers);
  return results;
}
