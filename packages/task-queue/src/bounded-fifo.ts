/**
 * Bounded FIFO queue backed by a ring buffer.
 *
 * O(1) offer, dequeue, and peek.
 * Reject-new overflow strategy: a full queue refuses the item.
 */
export class BoundedFifoQueue<T> {
  // Slots are boxed so a stored `undefined` stays distinguishable from an empty slot
  private readonly buffer: ({ readonly item: T } | undefined)[];
  private head = 0;
  private tail = 0;
  private count = 0;
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buffer = new Array<{ readonly item: T } | undefined>(capacity);
  }

  /**
   * Add an item at the tail.
   * Returns false, leaving the queue untouched, when it is full.
   */
  offer(item: T): boolean {
    if (this.count >= this.capacity) {
      return false;
    }
    this.buffer[this.tail] = { item };
    this.tail = (this.tail + 1) % this.capacity;
    this.count++;
    return true;
  }

  /**
   * Remove and return the oldest item, or undefined if empty.
   */
  dequeue(): T | undefined {
    const slot = this.buffer[this.head];
    if (this.count === 0 || slot === undefined) {
      return undefined;
    }
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return slot.item;
  }

  /**
   * Peek at the oldest item without removing it.
   */
  peek(): T | undefined {
    return this.count === 0 ? undefined : this.buffer[this.head]?.item;
  }

  /**
   * Remove all items, returned in FIFO order.
   */
  drain(): readonly T[] {
    const result: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const slot = this.buffer[(this.head + i) % this.capacity];
      if (slot !== undefined) result.push(slot.item);
    }
    this.buffer.fill(undefined);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    return result;
  }

  get size(): number {
    return this.count;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  get isFull(): boolean {
    return this.count >= this.capacity;
  }
}
