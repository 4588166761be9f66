/** Drains `items` with a fixed number of async slots; each slot takes the next unclaimed index. */
export async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T, slot: number) => Promise<void>,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async (_, slot) => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current], slot);
    }
  });
  await Promise.all(slots);
}
