/**
 * pLimit
 *
 * Limits the concurrency of async operations.
 *
 * @param concurrency - Max number of concurrent operations
 * @returns A function that accepts a thunk and executes it within the limit
 */
export function pLimit(concurrency: number) {
  if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
    throw new TypeError('Expected `concurrency` to be a number from 1 and up');
  }

  const queue: (() => void)[] = [];
  let activeCount = 0;

  const next = () => {
    activeCount--;
    const nextFn = queue.shift();
    if (nextFn) {
      nextFn();
    }
  };

  return async <T>(fn: () => Promise<T>): Promise<T> => {
    const execute = async () => {
      activeCount++;
      try {
        return await fn();
      } finally {
        next();
      }
    };

    if (activeCount < concurrency) {
      return execute();
    }
    return new Promise<T>((resolve, reject) => {
      queue.push(() => {
        execute().then(resolve, reject);
      });
    });
  };
}

/**
 * Map items through an async function with bounded concurrency.
 * Results come back in input order, not completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const limitFn = pLimit(limit);
  return Promise.all(items.map((item, index) => limitFn(() => fn(item, index))));
}
