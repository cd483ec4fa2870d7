export interface ResultChannelOptions<T> {
  capacity?: number;
  /** Items that may be discarded when the channel is over capacity. */
  isDroppable?: (item: T) => boolean;
}

/**
 * Bounded per-session outbound queue. The broadcaster pushes, the task that
 * serves the connection drains it with `for await`.
 */
export class ResultChannel<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
  private readonly capacity: number;
  private readonly isDroppable: (item: T) => boolean;
  private closed = false;
  private droppedCount = 0;

  constructor(options: ResultChannelOptions<T> = {}) {
    this.capacity = options.capacity ?? 256;
    this.isDroppable = options.isDroppable ?? (() => false);
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return true;
    }

    this.items.push(item);
    if (this.items.length > this.capacity) {
      const index = this.items.findIndex((queued) => this.isDroppable(queued));
      if (index >= 0) {
        this.items.splice(index, 1);
        this.droppedCount += 1;
      }
    }
    return true;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
