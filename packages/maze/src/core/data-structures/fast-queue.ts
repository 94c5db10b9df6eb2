/**
 * FIFO queue with O(1) amortized enqueue and dequeue.
 *
 * Array-backed with a moving head; the consumed prefix is dropped once it
 * dominates the backing array.
 *
 * @example
 * ```typescript
 * const frontier = new FastQueue<Cell>();
 * frontier.enqueue(cell(0, 0));
 * frontier.dequeue(); // { row: 0, column: 0 }
 * frontier.dequeue(); // undefined
 * ```
 */
export class FastQueue<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  /**
   * Remove and return the oldest item, or undefined when empty.
   */
  dequeue(): T | undefined {
    if (this.isEmpty) return undefined;

    const item = this.items[this.head];
    this.head++;

    if (this.head > 1024 && this.head > this.items.length / 2) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  static from<T>(items: Iterable<T>): FastQueue<T> {
    const queue = new FastQueue<T>();
    for (const item of items) {
      queue.enqueue(item);
    }
    return queue;
  }
}
