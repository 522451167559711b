/**
 * BoundedQueue
 *
 * FIFO hand-off between two worker pools. `push` suspends while the queue is
 * full, which is what keeps extraction from running arbitrarily far ahead of
 * embedding. After `close()`, pushes resolve false and pops drain what is
 * left, then resolve undefined.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly waitingPoppers: ((item: T | undefined) => void)[] = [];
  private readonly waitingPushers: { item: T; resolve: (accepted: boolean) => void }[] = [];
  private closed = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new TypeError('Expected `capacity` to be an integer from 1 and up');
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async push(item: T): Promise<boolean> {
    if (this.closed) {
      return false;
    }

    const popper = this.waitingPoppers.shift();
    if (popper) {
      popper(item);
      return true;
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return true;
    }

    return new Promise<boolean>((resolve) => {
      this.waitingPushers.push({ item, resolve });
    });
  }

  async pop(): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      const pusher = this.waitingPushers.shift();
      if (pusher) {
        this.items.push(pusher.item);
        pusher.resolve(true);
      }
      return item;
    }

    if (this.closed) {
      return undefined;
    }

    return new Promise<T | undefined>((resolve) => {
      this.waitingPoppers.push(resolve);
    });
  }

  /**
   * Stop accepting work. With `discard`, queued items are dropped as well.
   */
  close(discard = false): void {
    if (this.closed && !discard) {
      return;
    }
    this.closed = true;
    if (discard) {
      this.items.length = 0;
    }
    for (const pusher of this.waitingPushers.splice(0)) {
      pusher.resolve(false);
    }
    if (this.items.length === 0) {
      for (const popper of this.waitingPoppers.splice(0)) {
        popper(undefined);
      }
    }
  }
}

/**
 * Start `count` consumers on a queue. Each stops pulling once the signal fires
 * or the queue is closed and drained; an item already taken is always handled
 * to completion.
 */
export async function runWorkers<T>(
  count: number,
  queue: BoundedQueue<T>,
  handler: (item: T, workerId: number) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  const worker = async (workerId: number): Promise<void> => {
    while (!signal?.aborted) {
      const item = await queue.pop();
      if (item === undefined) {
        return;
      }
      await handler(item, workerId);
    }
  };

  await Promise.all(Array.from({ length: count }, (_, index) => worker(index)));
}

/**
 * Map over items with at most `limit` calls in flight. Results keep the input
 * order; the first rejection rejects the whole map.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new TypeError('Expected `limit` to be an integer from 1 and up');
  }

  const results: R[] = new Array<R>(items.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, () => worker()));
  return results;
}
