export type Comparator<T> = (a: T, b: T) => number;

export class BinaryHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly compare: Comparator<T>) {}

  get size() {
    return this.items.length;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  push(item: T) {
    this.items.push(item);
    this.siftUp(this.items.length - 1);
  }

  pop(): T | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  removeWhere(predicate: (item: T) => boolean): T[] {
    const removed: T[] = [];
    const kept: T[] = [];
    for (const item of this.items) {
      (predicate(item) ? removed : kept).push(item);
    }
    if (removed.length === 0) return removed;

    this.items.length = 0;
    for (const item of kept) {
      this.push(item);
    }
    return removed.sort(this.compare);
  }

  clear() {
    this.items.length = 0;
  }

  toSortedArray(): T[] {
    return [...this.items].sort(this.compare);
  }

  private siftUp(index: number) {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (this.compare(this.items[child], this.items[parent]) >= 0) return;
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number) {
    const length = this.items.length;
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < length && this.compare(this.items[left], this.items[smallest]) < 0) smallest = left;
      if (right < length && this.compare(this.items[right], this.items[smallest]) < 0) smallest = right;
      if (smallest === parent) return;
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private swap(a: number, b: number) {
    const held = this.items[a];
    this.items[a] = this.items[b];
    this.items[b] = held;
  }
}
