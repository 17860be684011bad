/**
 * Fixed-capacity FIFO. Pushing into a full buffer evicts and returns the oldest item.
 */
export class RingBuffer<T extends {}> {
  private readonly items: Array<T | undefined>;
  private head = 0;
  private length = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  get isFull(): boolean {
    return this.length === this.capacity;
  }

  push(item: T): T | undefined {
    const tail = (this.head + this.length) % this.capacity;
    if (this.length < this.capacity) {
      this.items[tail] = item;
      this.length += 1;
      return undefined;
    }
    const evicted = this.items[this.head];
    this.items[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /** Removes and returns the oldest item. */
  evict(): T | undefined {
    if (this.length === 0) return undefined;
    const oldest = this.items[this.head];
    this.items[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.length -= 1;
    return oldest;
  }

  latest(): T | undefined {
    if (this.length === 0) return undefined;
    return this.items[(this.head + this.length - 1) % this.capacity];
  }

  /** Up to `n` newest items, oldest first. */
  recent(n: number): T[] {
    const all = this.toArray();
    if (n <= 0) return [];
    return all.slice(Math.max(0, all.length - n));
  }

  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.length; i += 1) {
      const item = this.items[(this.head + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  clear(): void {
    this.items.fill(undefined);
    this.head = 0;
    this.length = 0;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.toArray()[Symbol.iterator]();
  }
}
