/**
 * Runs at most `concurrency` tasks at once; the rest wait in FIFO order.
 * A concurrency of 0 (or any non-finite value) disables the bound.
 */
export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

export function createLimiter(concurrency: number): Limiter {
  if (!Number.isFinite(concurrency) || concurrency <= 0) {
    return (task) => Promise.resolve().then(task);
  }

  let active = 0;
  const queue: (() => void)[] = [];

  function next() {
    const start = queue.shift();
    if (start) start();
  }

  return <T>(task: () => Promise<T>) =>
    new Promise<T>((resolve, reject) => {
      const start = () => {
        active++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            active--;
            next();
          });
      };
      if (active < concurrency) start();
      else queue.push(start);
    });
}
