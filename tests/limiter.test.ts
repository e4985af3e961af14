import { describe, it, expect } from '@jest/globals';
import { Limiter, limit } from '../src/utils/limiter';

const tick = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('Limiter', () => {
  it('never runs more than max tasks at once', async () => {
    const limiter = new Limiter(2);
    const running = new Set<number>();
    let maxConcurrent = 0;

    const tasks = Array.from({ length: 5 }, (_, i) =>
      limiter.limit(async () => {
        running.add(i);
        maxConcurrent = Math.max(maxConcurrent, running.size);
        await tick(10);
        running.delete(i);
        return i;
      })
    );

    await expect(Promise.all(tasks)).resolves.toEqual([0, 1, 2, 3, 4]);
    expect(maxConcurrent).toBe(2);
    expect(limiter.active).toBe(0);
    expect(limiter.pending).toBe(0);
  });

  it('starts waiting tasks in FIFO order', async () => {
    const limiter = new Limiter(1);
    const started: number[] = [];

    await Promise.all(
      [0, 1, 2, 3].map((i) =>
        limiter.limit(async () => {
          started.push(i);
          await tick(1);
        })
      )
    );

    expect(started).toEqual([0, 1, 2, 3]);
  });

  it('releases the slot when a task throws', async () => {
    const limiter = new Limiter(1);

    await expect(limiter.limit(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(limiter.limit(async () => 'next')).resolves.toBe('next');
    expect(limiter.active).toBe(0);
  });

  it('rejects a non-positive size', () => {
    expect(() => new Limiter(0)).toThrow(RangeError);
    expect(() => new Limiter(1.5)).toThrow(RangeError);
  });
});

describe('lane limit', () => {
  it('runs work on a named lane', async () => {
    await expect(limit('arxiv', async () => 42)).resolves.toBe(42);
  });
});
