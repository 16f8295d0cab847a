import type { Heap, TopKSelector } from "../heap.js";

class ArrayHeap<T> implements Heap<T> {
  private readonly data: T[] = [];

  constructor(private readonly less: (a: T, b: T) => boolean) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    const a = this.data;
    a.push(item);
    let i = a.length - 1;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(a[i]!, a[p]!)) break;
      this.swap(i, p);
      i = p;
    }
  }

  replaceTop(item: T): void {
    this.data[0] = item;
    this.siftDown(0);
  }

  toArray(): T[] {
    return Array.from(this.data);
  }

  private swap(i: number, j: number): void {
    const a = this.data;
    [a[i]!, a[j]!] = [a[j]!, a[i]!];
  }

  private siftDown(i: number): void {
    const a = this.data;
    const n = a.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let smallest = i;

      if (l < n && this.less(a[l]!, a[smallest]!)) smallest = l;
      if (r < n && this.less(a[r]!, a[smallest]!)) smallest = r;
      if (smallest === i) return;

      this.swap(i, smallest);
      i = smallest;
    }
  }
}

interface Entry<T> {
  item: T;
  /** arrival position; breaks comparator ties so earlier items win */
  seq: number;
}

/**
 * Keeps a fixed-size min-heap of the best K items: O(m log K).
 *
 * Comparator uses Array.sort semantics (a before b if <0). We treat "best" as comparator ascending,
 * so the heap tracks the *worst of the best* at the top. Ties fall back to arrival order, so the
 * output equals a stable sort even when the comparator is not total.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[] {
    if (k <= 0) return [];

    const order = (a: Entry<T>, b: Entry<T>) => comparator(a.item, b.item) || a.seq - b.seq;
    // less(a,b) means a is WORSE than b (for min-heap of worst items)
    const heap = new ArrayHeap<Entry<T>>((a, b) => order(a, b) > 0);

    let seq = 0;
    for (const item of items) {
      const entry = { item, seq: seq++ };
      if (heap.size() < k) {
        heap.push(entry);
        continue;
      }
      const worst = heap.peek();
      // if item is better than worst => replace
      if (worst !== undefined && order(entry, worst) < 0) {
        heap.replaceTop(entry);
      }
    }

    return heap.toArray().sort(order).map((e) => e.item);
  }
}
