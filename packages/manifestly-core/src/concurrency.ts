/**
 * Bounded worker pool.
 *
 * Up to `limit` workers pull items from a shared queue. Each item's outcome
 * is recorded at the item's input index, so results never depend on
 * completion order. A failing item does not stop the others.
 */

export type SettledOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'cancelled' };

export interface ConcurrencyOptions {
  /** Stops new items from being started once aborted. In-flight items finish. */
  signal?: AbortSignal;
}

export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  options: ConcurrencyOptions = {},
): Promise<SettledOutcome<R>[]> {
  const outcomes: SettledOutcome<R>[] = items.map(() => ({ status: 'cancelled' }));
  let next = 0;

  const processNext = async (): Promise<void> => {
    while (next < items.length) {
      if (options.signal?.aborted) {
        return;
      }
      const index = next++;
      try {
        outcomes[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        outcomes[index] = { status: 'rejected', reason };
      }
    }
  };

  const workers = Math.max(1, Math.min(limit, items.length));
  const inflight: Promise<void>[] = [];
  for (let i = 0; i < workers; i++) {
    inflight.push(processNext());
  }
  await Promise.all(inflight);

  return outcomes;
}

/**
 * Counting semaphore used to throttle requests against a remote backend
 * independently of how many callers are active.
 */
export class RequestLimiter {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number) {}

  get pending(): number {
    return this.waiting.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const wake = this.waiting.shift();
    if (wake) {
      wake();
    }
  }
}
