/**
 * Time utilities
 */

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,3})?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Request timestamp in epoch milliseconds as a decimal string
 * @param now clock returning epoch milliseconds
 */
export function currentTimestamp(now: () => number = Date.now): string {
  return String(Math.trunc(now()));
}

/**
 * Checks a `modifiedSince` value: YYYY-MM-DD or an ISO 8601 date-time
 * that names a real calendar date
 */
export function isValidModifiedSince(value: string): boolean {
  if (!DATE_ONLY.test(value) && !DATE_TIME.test(value)) {
    return false;
  }

  const year = parseInt(value.substring(0, 4), 10);
  const month = parseInt(value.substring(5, 7), 10);
  const day = parseInt(value.substring(8, 10), 10);

  // Date.UTC rolls 2024-02-30 over to March; compare the parts back
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day;
}

/**
 * Waits for `ms`, rejecting early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Sleep aborted'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Sleep aborted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
