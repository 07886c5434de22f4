import { describe, expect, it } from 'vitest';
import { MinHeap } from './minHeap';

describe('MinHeap', () => {
  it('pops in comparator order', () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    for (const n of [5, 3, 9, 1, 7, 3]) heap.push(n);

    const out: number[] = [];
    while (heap.size > 0) {
      const next = heap.pop();
      if (next !== undefined) out.push(next);
    }
    expect(out).toEqual([1, 3, 3, 5, 7, 9]);
  });

  it('returns undefined when empty', () => {
    const heap = new MinHeap<string>((a, b) => a.localeCompare(b));
    expect(heap.pop()).toBeUndefined();
    expect(heap.size).toBe(0);
  });
});
