/**
 * Bounded concurrency for independent async tasks
 */

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Tasks start in submission order. A finishing task hands its slot straight
 * to the oldest waiter, so a task submitted in between cannot take it.
 */
export function createLimiter(maxConcurrency: number): Limiter {
  const capacity = Math.max(1, Math.floor(maxConcurrency));
  let active = 0;
  const waiting: Array<() => void> = [];

  const acquire = (): Promise<void> => {
    if (active < capacity) {
      active += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => waiting.push(resolve));
  };

  const release = (): void => {
    const next = waiting.shift();
    if (next) {
      next();
    } else {
      active -= 1;
    }
  };

  return async function limit<T>(task: () => Promise<T>): Promise<T> {
    await acquire();
    try {
      return await task();
    } finally {
      release();
    }
  };
}
