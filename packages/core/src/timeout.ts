/**
 * Deadline for a single awaited operation
 */

export class TimeoutError extends Error {
  readonly ms: number;

  constructor(message: string, ms: number) {
    super(message);
    this.name = "TimeoutError";
    this.ms = ms;
  }
}

/**
 * Settle with `promise`, or reject with a TimeoutError once `ms` elapses.
 * The timer is always cleared; with `ms` undefined the promise is returned as is.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number | undefined,
  message = `Operation timed out after ${ms}ms`
): Promise<T> {
  if (ms === undefined) {
    return promise;
  }
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(message, ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
