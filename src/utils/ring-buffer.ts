/**
 * Bounded history: keeps the most recent `capacity` items, evicting the
 * oldest on overflow. Backs the permission decision history and the agent
 * stderr tail.
 */
export class RingBuffer<T> implements Iterable<T> {
  private slots: Array<T | undefined>;
  private start = 0;
  private length = 0;
  private evicted = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  push(item: T): void {
    if (this.length < this.capacity) {
      this.slots[(this.start + this.length) % this.capacity] = item;
      this.length++;
      return;
    }
    // Full: overwrite the oldest slot and advance the start
    this.slots[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
    this.evicted++;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.length; i++) {
      const item = this.slots[(this.start + i) % this.capacity];
      if (item !== undefined) yield item;
    }
  }

  /** Oldest first. */
  toArray(): T[] {
    return [...this];
  }

  countWhere(predicate: (item: T) => boolean): number {
    let n = 0;
    for (const item of this) if (predicate(item)) n++;
    return n;
  }

  get size(): number {
    return this.length;
  }

  /** Items pushed out by overflow since construction or the last clear. */
  get dropped(): number {
    return this.evicted;
  }

  clear(): void {
    this.slots = new Array<T | undefined>(this.capacity);
    this.start = 0;
    this.length = 0;
    this.evicted = 0;
  }
}
