/** Limit value meaning "drain everything". */
export const UNBOUNDED_LIMIT = -1;

interface HeapEntry<T> {
  item: T;
  score: number;
  seq: number;
}

/**
 * Binary max-heap keyed by a numeric score.
 * Equal scores pop in insertion order.
 */
export class ResultQueue<T> {
  private readonly heap: HeapEntry<T>[] = [];
  private nextSeq = 0;

  constructor(private readonly scoreOf: (item: T) => number) {}

  get length(): number {
    return this.heap.length;
  }

  len(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  push(item: T): void {
    this.heap.push({ item, score: this.scoreOf(item), seq: this.nextSeq++ });
    this.siftUp(this.heap.length - 1);
  }

  peek(): T | undefined {
    return this.heap[0]?.item;
  }

  popHighest(): T | undefined {
    const top = this.heap[0];
    if (!top) {
      return undefined;
    }
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top.item;
  }

  private outranks(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
    return a.score > b.score || (a.score === b.score && a.seq < b.seq);
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.outranks(this.heap[i], this.heap[parent])) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const size = this.heap.length;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let best = i;
      if (left < size && this.outranks(this.heap[left], this.heap[best])) best = left;
      if (right < size && this.outranks(this.heap[right], this.heap[best])) best = right;
      if (best === i) return;
      this.swap(i, best);
      i = best;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = tmp;
  }
}

/**
 * Number of entries to pop for a requested limit.
 * Any negative limit means all of them.
 */
export function resolveLimit(count: number, limit: number): number {
  if (limit < 0) {
    return count;
  }
  return Math.min(limit, count);
}

/**
 * Pops the top `limit` entries in descending score order.
 * The queue is consumed by this call.
 */
export function takeTop<T>(queue: ResultQueue<T>, limit: number): T[] {
  const count = resolveLimit(queue.length, limit);
  const out: T[] = [];
  for (let i = 0; i < count; i++) {
    const item = queue.popHighest();
    if (item === undefined) break;
    out.push(item);
  }
  return out;
}
