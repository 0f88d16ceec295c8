/**
 * Bounded FIFO with oldest-drop. Stale frames are not worth sending late:
 * the network stack above retransmits what it still needs.
 */
export class SendQueue<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Append an item. Returns the item evicted to make room, if any. */
  push(item: T): T | undefined {
    this.items.push(item);
    return this.items.length > this.capacity ? this.items.shift() : undefined;
  }

  /**
   * Put an item back at the head after a failed send. When the queue
   * filled up meanwhile the item is itself the oldest, so it is returned
   * as dropped instead.
   */
  requeue(item: T): T | undefined {
    if (this.items.length >= this.capacity) return item;
    this.items.unshift(item);
    return undefined;
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  get size(): number {
    return this.items.length;
  }

  /** Remove and return everything. */
  clear(): T[] {
    const items = this.items;
    this.items = [];
    return items;
  }
}
