import pLimit from 'p-limit';

/**
 * Runs `task` over every item with at most `width` in flight and resolves
 * once all of them have settled. Result order matches `items`.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  width: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const limit = pLimit(Math.max(1, Math.floor(width)));
  return Promise.all(items.map((item, index) => limit(() => task(item, index))));
}
