export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  const size = items.length;
  if (size === 0) return;
  let cursor = 0;
  const runners: Promise<void>[] = [];
  const limit = Math.max(1, concurrency);
  for (let i = 0; i < Math.min(limit, size); i++) {
    runners.push((async function pump() {
      while (true) {
        const current = cursor++;
        if (current >= size) break;
        await worker(items[current], current);
      }
    })());
  }
  await Promise.all(runners);
}

/** Reads a concurrency override such as FEED_CONCURRENCY=8, clamped to [1, max]. */
export function concurrencyFromEnv(value: string | undefined, fallback: number, max: number): number {
  const v = Number(value);
  if (Number.isFinite(v) && v >= 1) return Math.min(Math.floor(v), max);
  return fallback;
}
