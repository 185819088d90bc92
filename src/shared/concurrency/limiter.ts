export type Limiter = {
  <T>(task: () => Promise<T>): Promise<T>;
  activeCount: () => number;
  pendingCount: () => number;
};

/**
 * Counting semaphore for promise-returning tasks. Tasks start in the order
 * they were submitted; at most `concurrency` run at once.
 *
 *   const limit = createLimiter(10);
 *   await Promise.all(devices.map((d) => limit(() => push(d))));
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const start = queue.shift();
    if (!start) return;
    active += 1;
    start();
  };

  const limit = <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            active -= 1;
            next();
          });
      });
      next();
    });

  return Object.assign(limit, {
    activeCount: () => active,
    pendingCount: () => queue.length
  });
};
