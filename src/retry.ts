/**
 * Retry and timeout helpers for model calls.
 */

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  /** Return false to stop retrying on this error */
  shouldRetry?: (err: unknown) => boolean;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Run `fn` up to `attempts` times with linear backoff; rethrows the last error */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === options.attempts || options.shouldRetry?.(err) === false) {
        break;
      }
      await sleep(options.delayMs * attempt);
    }
  }

  throw lastError;
}

/**
 * Run `fn` with an abort signal that fires after `timeoutMs`.
 * Rejects with `onTimeout()` if the budget runs out first, whether or not
 * `fn` honours the signal.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
