import { describe, expect, it } from "vitest";
import { MinHeapTopKSelector } from "../minHeapTopK.js";
import { SortTopKSelector } from "../sortTopK.js";

describe("MinHeapTopKSelector", () => {
  it("returns best K by comparator", () => {
    const sel = new MinHeapTopKSelector<number>();
    const out = sel.topK([5, 1, 3, 2, 4], 3, (a, b) => b - a); // descending
    expect(out).toEqual([5, 4, 3]);
  });

  it("returns everything sorted when K exceeds the input", () => {
    const sel = new MinHeapTopKSelector<number>();
    expect(sel.topK([2, 9, 4], 10, (a, b) => b - a)).toEqual([9, 4, 2]);
  });

  it("returns nothing for K = 0", () => {
    const sel = new MinHeapTopKSelector<number>();
    expect(sel.topK([1, 2, 3], 0, (a, b) => b - a)).toEqual([]);
  });

  it("keeps the earlier item when it ties with a later one", () => {
    const sel = new MinHeapTopKSelector<{ id: string; n: number }>();
    const items = [
      { id: "x", n: 2 },
      { id: "y", n: 2 },
      { id: "z", n: 1 },
    ];
    const out = sel.topK(items, 1, (a, b) => b.n - a.n);
    expect(out.map((i) => i.id)).toEqual(["x"]);
  });

  it("keeps arrival order among ties that survive a replacement", () => {
    const sel = new MinHeapTopKSelector<{ id: string; n: number }>();
    const items = [
      { id: "a", n: 1 },
      { id: "b", n: 2 },
      { id: "c", n: 3 },
      { id: "d", n: 2 },
    ];
    const out = sel.topK(items, 3, (x, y) => y.n - x.n);
    expect(out.map((i) => i.id)).toEqual(["c", "b", "d"]);
  });
});

describe("SortTopKSelector", () => {
  it("matches the heap selector on a total order", () => {
    const items = Array.from({ length: 50 }, (_, order) => ({ order, count: (order * 7) % 5 }));
    const cmp = (a: { order: number; count: number }, b: { order: number; count: number }) =>
      b.count - a.count || a.order - b.order;

    for (const k of [0, 1, 7, 50, 80]) {
      const viaHeap = new MinHeapTopKSelector<(typeof items)[number]>().topK(items, k, cmp);
      const viaSort = new SortTopKSelector<(typeof items)[number]>().topK(items, k, cmp);
      expect(viaHeap).toEqual(viaSort);
    }
  });

  it("matches the heap selector when the comparator only looks at the count", () => {
    const items = Array.from({ length: 40 }, (_, id) => ({ id, count: (id * 3) % 4 }));
    const cmp = (a: { count: number }, b: { count: number }) => b.count - a.count;

    for (const k of [2, 5, 13, 40]) {
      const viaHeap = new MinHeapTopKSelector<(typeof items)[number]>().topK(items, k, cmp);
      const viaSort = new SortTopKSelector<(typeof items)[number]>().topK(items, k, cmp);
      expect(viaHeap.map((i) => i.id)).toEqual(viaSort.map((i) => i.id));
    }
  });
});
