/**
 * Work Distributor
 *
 * Unbounded FIFO hand-off between the single producer (the enumerator) and
 * the worker pool. `complete()` is the producer-done flag consumers check to
 * decide between waiting and exiting.
 *
 * All mutation happens between awaits on one event loop, so the queue needs
 * no locking.
 *
 * @module search/work-queue
 */

export class WorkQueue<T> {
  private items: T[] = [];
  private head = 0;
  private completed = false;

  /**
   * Add an item for the workers.
   *
   * @throws Error when called after complete()
   */
  enqueue(item: T): void {
    if (this.completed) {
      throw new Error("Cannot enqueue after the producer completed");
    }
    this.items.push(item);
  }

  /**
   * Take the oldest item, or undefined if the queue is momentarily empty.
   */
  tryDequeue(): T | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }

    const item = this.items[this.head];
    this.head++;

    // Reclaim the consumed prefix once it dominates the backing array
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  /**
   * Mark the producer as finished. Idempotent.
   */
  complete(): void {
    this.completed = true;
  }

  /** Whether the producer has finished */
  get isCompleted(): boolean {
    return this.completed;
  }

  /** Items waiting to be taken */
  get size(): number {
    return this.items.length - this.head;
  }

  /** True when the producer is done and nothing is left to take */
  get isDrained(): boolean {
    return this.completed && this.size === 0;
  }
}
