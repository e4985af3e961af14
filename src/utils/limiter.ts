type Lane = 'arxiv' | 'webhook';

/**
 * Counting semaphore. At most `max` functions passed to `limit` run at once;
 * the rest wait in FIFO order.
 */
export class Limiter {
  private queue: Array<() => void> = [];
  private running = 0;

  constructor(readonly max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Limiter size must be a positive integer, got ${max}`);
    }
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }

  async limit<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.running < this.max) {
      this.running += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.queue.push(() => {
        this.running += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.running -= 1;
    const next = this.queue.shift();
    if (next) {
      next();
    }
  }
}

function laneSize(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

const laneLimiters: Record<Lane, Limiter> = {
  arxiv: new Limiter(laneSize(process.env.ARXIV_CONCURRENCY, 1)),
  webhook: new Limiter(laneSize(process.env.WEBHOOK_CONCURRENCY, 1)),
};

export function limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
  return laneLimiters[lane].limit(fn);
}
