/**
 * First-in, first-out queue with constant-time dequeue.
 *
 * Items are appended to a backing array and read through a head index;
 * the consumed prefix is dropped once it makes up most of the array.
 */

const COMPACT_THRESHOLD = 1024;

export class FifoQueue<T> {
  private items: (T | undefined)[] = [];
  private head = 0;

  get size(): number {
    return this.items.length - this.head;
  }

  push(item: T): void {
    this.items.push(item);
  }

  /** Remove and return the oldest item, or undefined when empty */
  shift(): T | undefined {
    if (this.head >= this.items.length) return undefined;
    const item = this.items[this.head];
    this.items[this.head] = undefined;
    this.head++;
    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }
}
