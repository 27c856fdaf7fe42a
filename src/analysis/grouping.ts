/**
 * Grouping and counting helpers shared by the analysis stages.
 *
 * Maps keep insertion order, so every grouping here is deterministic for
 * a given input order.
 */

export interface KeyCount<K> {
  key: K;
  count: number;
}

/**
 * Group items by key, preserving first-seen key order and item order.
 */
export function groupBy<T, K>(items: Iterable<T>, keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

/**
 * Count occurrences per key, in first-seen key order.
 */
export function countBy<T, K>(items: Iterable<T>, keyOf: (item: T) => K): Map<K, number> {
  const counts = new Map<K, number>();
  for (const item of items) {
    const key = keyOf(item);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/**
 * The `limit` most frequent keys, highest count first. Equal counts keep
 * first-seen order.
 */
export function mostCommon<K>(counts: Map<K, number>, limit?: number): KeyCount<K>[] {
  const ranked = [...counts].map(([key, count]) => ({ key, count }));
  ranked.sort((a, b) => b.count - a.count);
  return limit === undefined ? ranked : ranked.slice(0, limit);
}
