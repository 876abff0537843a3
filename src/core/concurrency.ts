/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight. Each
 * item is taken exactly once from a shared cursor. Once `signal` aborts, no
 * further items are started; calls already running are awaited.
 */
export async function processWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  let index = 0;
  const slotCount = Math.max(1, Math.min(concurrency, items.length));
  const slots = Array.from({ length: slotCount }, async () => {
    while (!signal?.aborted) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current]);
    }
  });
  await Promise.all(slots);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
