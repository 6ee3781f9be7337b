/**
 * A tiny concurrency limiter (no external deps).
 * Usage:
 *   const limit = createLimiter(10);
 *   await Promise.all(items.map(i => limit(() => doWork(i))));
 */
export type Limiter = <T>(task: () => Promise<T> | T) => Promise<T>;

export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const fn = queue.shift();
    if (!fn) return;
    active += 1;
    fn();
  };

  return <T>(task: () => Promise<T> | T): Promise<T> => {
    return new Promise<T>((resolve, reject) => {
      queue.push(async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(err);
        } finally {
          active -= 1;
          next();
        }
      });
      next();
    });
  };
};

/**
 * Mutual exclusion for async critical sections: tasks run one at a time in call order.
 */
export const createMutex = (): Limiter => createLimiter(1);
