/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import { isTransientFailure } from '../providers/errors.js';
import { MAX_TIMER_DELAY_MS, delay } from './delay.js';
import { formatDuration } from './duration.js';
import {
  CancellationError,
  RetryExhaustedError,
  RetryInvariantError,
  findErrorInChain,
  getErrorMessage,
} from './errors.js';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 1000;

export interface RetryAttempt {
  /** 0-based index of the attempt that failed. */
  attempt: number;
  elapsedMs: number;
  error: unknown;
  /** Wait before the next attempt. */
  delayMs: number;
}

export interface RetryOptions {
  /** Total number of calls allowed, including the first one. */
  maxRetries: number;
  /** Backoff unit; the wait after attempt `n` (0-based) is `baseDelayMs * (n + 1)`. */
  baseDelayMs: number;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (attempt: RetryAttempt) => void;
  signal?: AbortSignal;
  /** Label used in log lines and cancellation messages. */
  operation: string;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: DEFAULT_MAX_RETRIES,
  baseDelayMs: DEFAULT_RETRY_BASE_DELAY_MS,
  isRetryable: isRetryableError,
  operation: 'generate',
};

/**
 * True when some error in the `cause` chain opts into the TransientFailure
 * capability and reports a timeout or a temporary condition.
 */
export function isRetryableError(error: unknown): boolean {
  const transient = findErrorInChain(error, isTransientFailure);
  if (!transient) {
    return false;
  }
  return transient.isTimeout() || transient.isTemporary();
}

/**
 * Linear backoff for the 0-based `attempt` that just failed.
 */
export function backoffDelayMs(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * (attempt + 1);
}

/**
 * Longest wait a run with this budget can reach: the one after the
 * second-to-last attempt.
 */
export function maxBackoffDelayMs(
  maxRetries: number,
  baseDelayMs: number,
): number {
  return maxRetries < 2 ? 0 : backoffDelayMs(maxRetries - 2, baseDelayMs);
}

/**
 * Calls `fn` until it succeeds, the error is not retryable, or the attempt
 * budget is spent. Waits between attempts race against `options.signal`.
 *
 * @throws CancellationError when the signal aborts before the first call or
 *   during a wait.
 * @throws RetryExhaustedError wrapping the last failure otherwise.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options?: Partial<RetryOptions>,
): Promise<T> {
  const maxRetries = options?.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries;
  const baseDelayMs =
    options?.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs;
  const isRetryable =
    options?.isRetryable ?? DEFAULT_RETRY_OPTIONS.isRetryable;
  const operation = options?.operation ?? DEFAULT_RETRY_OPTIONS.operation;
  const onRetry = options?.onRetry;
  const signal = options?.signal;

  if (!Number.isInteger(maxRetries) || maxRetries <= 0) {
    throw new RangeError('maxRetries must be a positive integer.');
  }
  if (!Number.isFinite(baseDelayMs) || baseDelayMs < 0) {
    throw new RangeError('baseDelayMs must be a non-negative number.');
  }
  if (maxBackoffDelayMs(maxRetries, baseDelayMs) > MAX_TIMER_DELAY_MS) {
    throw new RangeError(
      `baseDelayMs * (maxRetries - 1) must be at most ${MAX_TIMER_DELAY_MS}ms.`,
    );
  }
  if (signal?.aborted) {
    throw new CancellationError(operation, { cause: signal.reason });
  }

  const logger = DebugLogger.getLogger('steadychat:retry');
  const startedAt = Date.now();

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      const result = await fn(attempt);
      if (attempt > 0) {
        logger.log(
          () => `${operation} succeeded on retry attempt ${attempt + 1}`,
        );
      }
      return result;
    } catch (error) {
      if (error instanceof CancellationError) {
        throw error;
      }
      if (signal?.aborted) {
        throw new CancellationError(operation, { cause: error });
      }

      const isLastAttempt = attempt >= maxRetries - 1;
      const retryable = isRetryable(error);
      if (!retryable || isLastAttempt) {
        logger.warn(
          () =>
            `${operation} giving up after ${attempt + 1} attempt(s) (${retryable ? 'attempts exhausted' : 'not retryable'}): ${getErrorMessage(error)}`,
        );
        throw new RetryExhaustedError(
          attempt + 1,
          retryable ? 'attempts-exhausted' : 'non-retryable',
          error,
        );
      }

      const delayMs = backoffDelayMs(attempt, baseDelayMs);
      logger.warn(
        () =>
          `${operation} attempt ${attempt + 1} failed: ${getErrorMessage(error)}, retrying in ${formatDuration(delayMs)}`,
      );
      onRetry?.({
        attempt,
        elapsedMs: Date.now() - startedAt,
        error,
        delayMs,
      });

      await delay(delayMs, signal, `${operation} retry`);
    }
  }

  throw new RetryInvariantError(operation);
}
