/**
 * Remote call helpers: timeout bound, failure classification and
 * exponential-backoff retry for the remote gateway.
 */

import { AppError } from '@/src/lib/errors/app-error';

/** Minimal view of a Supabase/PostgREST response error */
export type RemoteFailure = {
  status: number;
  message: string;
  code?: string;
};

export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  /** Called before each retry (attempt is 1-based, the one that failed) */
  onRetry?: (attempt: number, delayMs: number, error: AppError) => void;
  sleep?: (ms: number) => Promise<void>;
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Map a failed response to the error taxonomy.
 * status 0 means the request never got an HTTP answer (fetch failed).
 */
export function classifyRemoteFailure(
  operation: string,
  failure: RemoteFailure,
): AppError {
  const { status } = failure;
  const transient =
    status === 0 || status === 408 || status === 429 || status >= 500;
  const details = {
    operation,
    status,
    ...(failure.code ? { remoteCode: failure.code } : {}),
  };
  if (transient) {
    return new AppError(
      'NETWORK_ERROR',
      `Network issue during ${operation}: ${failure.message}`,
      details,
    );
  }
  return new AppError(
    'REMOTE_ERROR',
    `Remote service rejected ${operation}: ${failure.message}`,
    details,
  );
}

/**
 * Reject with NETWORK_ERROR when `task` does not settle within `timeoutMs`.
 * The signal is aborted on timeout so the underlying request can stop.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => PromiseLike<T>,
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(
        new AppError(
          'NETWORK_ERROR',
          `Timed out after ${timeoutMs}ms during ${operation}`,
          { operation, timeoutMs },
        ),
      );
    }, timeoutMs);
  });
  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Run `task`, retrying retryable AppErrors with delays of
 * baseDelayMs, 2×baseDelayMs, 4×baseDelayMs, ...
 * Non-retryable errors are thrown immediately.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const sleep = options.sleep ?? delay;
  let lastError: AppError | null = null;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await task(attempt);
    } catch (err) {
      const error =
        err instanceof AppError
          ? err
          : new AppError('NETWORK_ERROR', 'Remote call failed', err);
      lastError = error;
      if (!error.isRetryable || attempt === options.maxAttempts) break;

      const delayMs = options.baseDelayMs * Math.pow(2, attempt - 1);
      options.onRetry?.(attempt, delayMs, error);
      await sleep(delayMs);
    }
  }

  throw lastError ?? new AppError('REMOTE_ERROR', 'Remote call was not attempted');
}
