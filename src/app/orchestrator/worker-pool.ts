/**
 * Bounded worker pool with a single-consumer result channel.
 * Purpose: run up to N jobs at once and hand every result to one loop as it completes.
 * Assumptions: jobs are async and independent; the consumer drains `results` to completion.
 * Usage:
 *   const pool = runWorkerPool(batches, { concurrency: 4, run, onError });
 *   for await (const { item, result } of pool.results) { ... }
 *   const { notStarted } = await pool.completion;
 */

// =============================================================================
// RESULT CHANNEL
// =============================================================================

type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
};

export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;

  push(item: T): void {
    if (this.closed) {
      throw new Error("Cannot push to a closed queue");
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
      return;
    }
    this.items.push(item);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  fail(error: unknown): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = { error };
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}

// =============================================================================
// POOL
// =============================================================================

export type WorkerPoolOptions<TItem, TResult> = {
  concurrency: number;
  run: (item: TItem) => Promise<TResult>;
  // Turns a job that threw into a result, so one failure never stops its siblings.
  onError: (item: TItem, error: unknown) => TResult;
  stopSignal?: AbortSignal;
};

export type WorkerPoolResult<TItem, TResult> = {
  item: TItem;
  result: TResult;
};

export type WorkerPoolCompletion = {
  dispatched: number;
  notStarted: number;
};

export type WorkerPoolHandle<TItem, TResult> = {
  results: AsyncIterable<WorkerPoolResult<TItem, TResult>>;
  completion: Promise<WorkerPoolCompletion>;
};

export function runWorkerPool<TItem, TResult>(
  items: readonly TItem[],
  options: WorkerPoolOptions<TItem, TResult>,
): WorkerPoolHandle<TItem, TResult> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new Error(`concurrency must be an integer of at least 1 (received ${options.concurrency})`);
  }

  const queue = new AsyncQueue<WorkerPoolResult<TItem, TResult>>();
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      if (options.stopSignal?.aborted) return;

      const item = items[cursor];
      cursor += 1;

      let result: TResult;
      try {
        result = await options.run(item);
      } catch (err) {
        result = options.onError(item, err);
      }
      queue.push({ item, result });
    }
  };

  const workerCount = Math.min(options.concurrency, items.length);
  const workers = Array.from({ length: workerCount }, () => worker());

  const completion = Promise.all(workers).then(
    () => {
      queue.close();
      return { dispatched: cursor, notStarted: items.length - cursor };
    },
    (err: unknown) => {
      // Surfaces through the result channel; the consumer's loop rethrows it.
      queue.fail(err);
      return { dispatched: cursor, notStarted: items.length - cursor };
    },
  );

  return { results: queue, completion };
}
