import { describe, it, expect } from 'vitest';
import { RequestLimiter, runWithConcurrency } from '../concurrency.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('runWithConcurrency', () => {
  it('should keep results in input order regardless of completion order', async () => {
    const delays = [30, 5, 15, 0];
    const outcomes = await runWithConcurrency(delays, 4, async (ms, index) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return index * 10;
    });

    expect(outcomes).toEqual([
      { status: 'fulfilled', value: 0 },
      { status: 'fulfilled', value: 10 },
      { status: 'fulfilled', value: 20 },
      { status: 'fulfilled', value: 30 },
    ]);
  });

  it('should never run more than limit workers at once', async () => {
    let active = 0;
    let peak = 0;
    await runWithConcurrency(Array.from({ length: 12 }, (_, i) => i), 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 2));
      active--;
    });
    expect(peak).toBe(3);
  });

  it('should record failures without stopping other items', async () => {
    const boom = new Error('boom');
    const outcomes = await runWithConcurrency([1, 2, 3], 2, async (n) => {
      if (n === 2) throw boom;
      return n;
    });
    expect(outcomes).toEqual([
      { status: 'fulfilled', value: 1 },
      { status: 'rejected', reason: boom },
      { status: 'fulfilled', value: 3 },
    ]);
  });

  it('should mark items not started after abort as cancelled', async () => {
    const controller = new AbortController();
    const outcomes = await runWithConcurrency(
      [1, 2, 3, 4],
      1,
      async (n) => {
        if (n === 2) controller.abort();
        return n;
      },
      { signal: controller.signal },
    );
    expect(outcomes.map((o) => o.status)).toEqual(['fulfilled', 'fulfilled', 'cancelled', 'cancelled']);
  });

  it('should handle an empty input', async () => {
    expect(await runWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

describe('RequestLimiter', () => {
  it('should queue tasks beyond the limit', async () => {
    const limiter = new RequestLimiter(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    const runs = gates.map((gate, i) =>
      limiter.run(async () => {
        started.push(i);
        await gate.promise;
        return i;
      }),
    );

    await flush();
    expect(started).toEqual([0, 1]);
    expect(limiter.pending).toBe(1);

    gates[0].resolve();
    await runs[0];
    await flush();
    expect(started).toEqual([0, 1, 2]);

    gates[1].resolve();
    gates[2].resolve();
    expect(await Promise.all(runs)).toEqual([0, 1, 2]);
  });
});
