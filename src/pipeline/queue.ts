/**
 * Bounded async queue with an explicit close signal.
 * @module pipeline/queue
 */

/**
 * Result of `BoundedQueue.take`.
 */
export type QueueResult<T> = { readonly closed: false; readonly item: T } | { readonly closed: true };

interface Slot<T> {
  readonly item: T;
}

interface BlockedPut<T> {
  readonly item: T;
  readonly resolve: (accepted: boolean) => void;
}

/**
 * FIFO queue holding at most `capacity` items.
 *
 * `put` waits while the queue is full. After `close()` every waiting and
 * future `take` sees `closed` once the remaining items are consumed, and
 * `put` resolves false without enqueueing.
 */
export class BoundedQueue<T> {
  private items: Slot<T>[] = [];
  private takers: Array<(result: QueueResult<T>) => void> = [];
  private putters: BlockedPut<T>[] = [];
  private closed = false;
  private highWater = 0;

  constructor(readonly capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.items.length;
  }

  /** Highest number of items held at once */
  get maxLength(): number {
    return this.highWater;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueues an item, waiting for room.
   * @returns false when the queue was closed first
   */
  put(item: T): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }

    const taker = this.takers.shift();
    if (taker) {
      taker({ closed: false, item });
      return Promise.resolve(true);
    }

    if (this.items.length < this.capacity) {
      this.push(item);
      return Promise.resolve(true);
    }

    return new Promise(resolve => this.putters.push({ item, resolve }));
  }

  /**
   * Dequeues the next item, waiting for one.
   */
  take(): Promise<QueueResult<T>> {
    const next = this.items.shift();
    if (next) {
      this.admitBlockedPut();
      return Promise.resolve({ closed: false, item: next.item });
    }

    if (this.closed) {
      return Promise.resolve({ closed: true });
    }

    return new Promise(resolve => this.takers.push(resolve));
  }

  /**
   * Stops accepting items. Blocked puts resolve false.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const blocked of this.putters) {
      blocked.resolve(false);
    }
    this.putters = [];

    // takers only wait on an empty queue
    for (const taker of this.takers) {
      taker({ closed: true });
    }
    this.takers = [];
  }

  /**
   * Removes and returns every queued item.
   */
  drain(): T[] {
    const drained = this.items.map(slot => slot.item);
    this.items = [];
    for (const blocked of this.putters) {
      blocked.resolve(false);
    }
    this.putters = [];
    return drained;
  }

  private push(item: T): void {
    this.items.push({ item });
    this.highWater = Math.max(this.highWater, this.items.length);
  }

  private admitBlockedPut(): void {
    const blocked = this.putters.shift();
    if (blocked) {
      this.push(blocked.item);
      blocked.resolve(true);
    }
  }
}
