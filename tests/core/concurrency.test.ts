import { describe, it, expect } from '@jest/globals';
import { createLimiter } from '../../src/core/concurrency.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('createLimiter', () => {
  it('should never run more tasks than its capacity', async () => {
    const limit = createLimiter(2);
    let active = 0;
    let peak = 0;

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((value) =>
        limit(async () => {
          active += 1;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          active -= 1;
          return value * 10;
        }),
      ),
    );

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
  });

  it('should keep going after a task fails', async () => {
    const limit = createLimiter(1);
    const failing = limit(async () => {
      throw new Error('task failed');
    });
    const next = limit(async () => 'next');

    await expect(failing).rejects.toThrow('task failed');
    await expect(next).resolves.toBe('next');
  });

  it('should start waiting tasks in submission order', async () => {
    const limit = createLimiter(1);
    const started: string[] = [];
    const gate = deferred();

    const first = limit(async () => {
      started.push('a');
      await gate.promise;
    });
    const rest = ['b', 'c', 'd'].map((name) =>
      limit(async () => {
        started.push(name);
      }),
    );
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(started).toEqual(['a']);

    gate.resolve();
    await Promise.all([first, ...rest]);
    expect(started).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should hand a freed slot to a waiting task before a newly submitted one', async () => {
    const limit = createLimiter(1);
    const gate = deferred();
    let active = 0;
    let peak = 0;
    const order: string[] = [];
    const track = (name: string) => async () => {
      active += 1;
      peak = Math.max(peak, active);
      order.push(name);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
    };

    const first = limit(async () => {
      await gate.promise;
    });
    const waiting = limit(track('waiting'));
    gate.resolve();
    await first;
    const late = limit(track('late'));
    await Promise.all([waiting, late]);

    expect(order).toEqual(['waiting', 'late']);
    expect(peak).toBe(1);
  });
});
