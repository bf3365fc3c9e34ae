// ─── Concurrency Limiter ────────────────────────────────────

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight. Workers
 * check `signal` before taking the next item; items never started stay
 * `undefined` in the result.
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, idx: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array(items.length).fill(undefined);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length && !signal?.aborted) {
      const idx = next++;
      const item = items[idx];
      if (item === undefined) continue;
      results[idx] = await fn(item, idx);
    }
  }

  await Promise.all(
    Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker()),
  );
  return results;
}
