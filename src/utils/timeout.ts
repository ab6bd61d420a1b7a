/**
 * Timeout Utilities
 * =================
 * Bound calls to network dependencies (user store, revocation store).
 */

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Resolve/reject with `promise`, or reject with a TimeoutError after `ms`.
 * The timer is always cleared so nothing keeps the event loop alive.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });

  return Promise.race([promise, timeout]).finally(() => {
    if (timer) {clearTimeout(timer);}
  });
}
