import type { TopKSelector } from "../heap.js";

/** Full stable sort, then truncate: O(m log m). The reference the heap selector must match. */
export class SortTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[] {
    if (k <= 0) return [];
    return Array.from(items).sort(comparator).slice(0, k);
  }
}
