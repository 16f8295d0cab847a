/**
 * Minimal heap contract used for topK selection.
 * Intended for a fixed-size min-heap to keep best K items.
 */
export interface Heap<T> {
  size(): number;
  peek(): T | undefined;
  push(item: T): void;
  /** Replaces the top item with a single sift-down. */
  replaceTop(item: T): void;
  /** Converts heap contents to array (order implementation-defined). */
  toArray(): T[];
}

export interface TopKSelector<T> {
  /**
   * Returns top K items by comparator.
   * Comparator should behave like Array.sort: <0 means a before b.
   * Output must equal a stable full sort of `items` truncated to K.
   */
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[];
}
