// packages/core/src/engine/worker-pool.ts — Bounded concurrency for agent fan-out

export class AsyncSemaphore {
  private queue: Array<() => void> = [];
  private running = 0;

  constructor(private max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Semaphore size must be a positive integer, got ${max}`);
    }
  }

  get inFlight(): number {
    return this.running;
  }

  async acquire(): Promise<void> {
    if (this.running < this.max) {
      this.running++;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(() => {
        this.running++;
        resolve();
      });
    });
  }

  release(): void {
    this.running--;
    const next = this.queue.shift();
    if (next) next();
  }
}

export type PoolOutcome<R> = { status: 'done'; value: R } | { status: 'skipped' };

/**
 * Run `worker` over `items` with at most `limit` in flight.
 * Outcomes come back in input order. Items whose turn comes after
 * `shouldStart` returns false are skipped; running workers are left alone.
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  options?: { shouldStart?: () => boolean },
): Promise<PoolOutcome<R>[]> {
  const semaphore = new AsyncSemaphore(limit);
  return Promise.all(
    items.map(async (item, index): Promise<PoolOutcome<R>> => {
      await semaphore.acquire();
      try {
        if (options?.shouldStart && !options.shouldStart()) {
          return { status: 'skipped' };
        }
        return { status: 'done', value: await worker(item, index) };
      } finally {
        semaphore.release();
      }
    }),
  );
}
