interface HeapEntry {
  node: number;
  priority: number;
  sequence: number;
}

/**
 * Indexable binary min-heap over integer node ids, ordered by
 * (priority, sequence). Every push or decrease takes a fresh sequence number,
 * so among equal priorities the earliest insertion is popped first.
 */
export class FrontierQueue {
  private readonly heap: HeapEntry[] = [];
  private readonly positions = new Map<number, number>();
  private nextSequence = 0;

  get size(): number {
    return this.heap.length;
  }

  get isEmpty(): boolean {
    return this.heap.length === 0;
  }

  has(node: number): boolean {
    return this.positions.has(node);
  }

  priorityOf(node: number): number | undefined {
    const index = this.positions.get(node);
    return index === undefined ? undefined : this.heap[index].priority;
  }

  /** Inserts `node`, or lowers its priority when it is already queued. */
  push(node: number, priority: number): void {
    const index = this.positions.get(node);
    if (index === undefined) {
      const entry = { node, priority, sequence: this.nextSequence++ };
      this.heap.push(entry);
      this.positions.set(node, this.heap.length - 1);
      this.siftUp(this.heap.length - 1);
      return;
    }

    const entry = this.heap[index];
    if (priority >= entry.priority) return;
    entry.priority = priority;
    entry.sequence = this.nextSequence++;
    this.siftUp(index);
  }

  pop(): number | undefined {
    const top = this.heap[0];
    if (!top) return undefined;

    const last = this.heap.pop();
    this.positions.delete(top.node);
    if (last && last !== top) {
      this.heap[0] = last;
      this.positions.set(last.node, 0);
      this.siftDown(0);
    }
    return top.node;
  }

  private less(a: HeapEntry, b: HeapEntry): boolean {
    return a.priority < b.priority || (a.priority === b.priority && a.sequence < b.sequence);
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    this.heap[i] = b;
    this.heap[j] = a;
    this.positions.set(b.node, i);
    this.positions.set(a.node, j);
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(this.heap[i], this.heap[parent])) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    const n = this.heap.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.less(this.heap[left], this.heap[smallest])) smallest = left;
      if (right < n && this.less(this.heap[right], this.heap[smallest])) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }
}
