/**
 * Race `promise` against a timer. The timer is cleared as soon as
 * either side settles so no handle outlives the request.
 */
export function promiseTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let id: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((resolve, reject) => {
    id = setTimeout(() => reject(onTimeout()), ms);
  });

  return Promise
    .race([promise, timeout])
    .finally(() => clearTimeout(id));
}
