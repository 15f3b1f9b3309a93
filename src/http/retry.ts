/**
 * Bounded retry with linear backoff.
 */

import { ApiError, ValidationError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

export interface RetryOptions {
  /** Attempts after the first one. */
  retries: number;
  /** Delay before retry n (1-based) is `backoffMs * n`. */
  backoffMs: number;
  /** Called before each retry, e.g. to switch to a fresh identity. */
  onRetry?: (attempt: number, error: unknown) => void;
  logger?: Logger;
  /** Context added to retry log lines. */
  label?: string;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** Client errors worth another attempt: request timeout and rate limiting. */
const TRANSIENT_CLIENT_STATUSES = new Set([408, 429]);

/**
 * False for bad input and for 4xx responses other than 408 and 429, which
 * fail the same way on every attempt.
 */
export const isRetryable = (error: unknown): boolean => {
  if (error instanceof ValidationError) return false;
  if (error instanceof ApiError && error.status !== undefined) {
    return error.status < 400 || error.status >= 500 || TRANSIENT_CLIENT_STATUSES.has(error.status);
  }
  return true;
};

/**
 * Run an operation, retrying failures that `isRetryable` accepts.
 *
 * Once the retry budget is spent the last error propagates unchanged.
 */
export const withRetry = async <T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> => {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryable(error) || attempt >= options.retries) {
        throw error;
      }

      const delayMs = options.backoffMs * (attempt + 1);
      options.logger?.warn(
        { label: options.label, attempt: attempt + 1, delayMs, err: errorMessage(error) },
        "request failed, retrying",
      );
      options.onRetry?.(attempt + 1, error);
      await sleep(delayMs);
    }
  }
};
