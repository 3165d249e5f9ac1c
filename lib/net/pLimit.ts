/**
 * Minimal concurrency limiter (semaphore gate for async tasks).
 */
export interface Limiter {
  <T>(fn: () => Promise<T>): Promise<T>;
  /** Tasks currently holding a permit. */
  activeCount(): number;
  /** Tasks waiting for a permit. */
  pendingCount(): number;
}

export default function pLimit(concurrency: number): Limiter {
  if (!Number.isInteger(concurrency) && concurrency !== Infinity) {
    throw new TypeError('Expected `concurrency` to be a number');
  }
  if (concurrency < 1) {
    throw new TypeError('Expected `concurrency` to be >= 1');
  }

  const queue: Array<() => void> = [];
  let active = 0;

  function next() {
    active--;
    const run = queue.shift();
    if (run) run();
  }

  const limit = <T>(fn: () => Promise<T>): Promise<T> => {
    return new Promise<T>((resolve, reject) => {
      const run = () => {
        active++;
        // a synchronous throw in fn still releases the permit
        Promise.resolve().then(fn).then(resolve, reject).finally(next);
      };

      if (active < concurrency) {
        run();
      } else {
        queue.push(run);
      }
    });
  };

  return Object.assign(limit, {
    activeCount: () => active,
    pendingCount: () => queue.length,
  });
}
