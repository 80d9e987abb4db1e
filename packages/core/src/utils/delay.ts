/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CancellationError } from './errors.js';

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

function checkTimerDelay(ms: number, name: string): RangeError | undefined {
  if (Number.isNaN(ms) || ms > MAX_TIMER_DELAY_MS) {
    return new RangeError(
      `${name} must be at most ${MAX_TIMER_DELAY_MS}ms, got ${ms}`,
    );
  }
  return undefined;
}

/**
 * Resolves after `ms` milliseconds, or rejects with a
 * {@link CancellationError} as soon as `signal` aborts. Whichever side wins,
 * the timer is cleared and the abort listener removed.
 */
export function delay(
  ms: number,
  signal?: AbortSignal,
  operation = 'wait',
): Promise<void> {
  const invalid = checkTimerDelay(ms, 'delay');
  if (invalid) {
    return Promise.reject(invalid);
  }
  if (signal?.aborted) {
    return Promise.reject(
      new CancellationError(operation, { cause: signal.reason }),
    );
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancellationError(operation, { cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Aborts the returned signal after `ms` milliseconds or when `parent` aborts.
 * `dispose` must be called once the guarded work settles.
 */
export function createDeadline(
  ms: number,
  parent?: AbortSignal,
): { signal: AbortSignal; timedOut: () => boolean; dispose: () => void } {
  const invalid = checkTimerDelay(ms, 'deadline');
  if (invalid) {
    throw invalid;
  }
  const controller = new AbortController();
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`deadline of ${ms}ms exceeded`));
  }, ms);
  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Settles with `work`, or rejects with a {@link CancellationError} when
 * `signal` aborts first. Does not cancel `work` itself.
 */
export function raceWithSignal<T>(
  work: Promise<T>,
  signal: AbortSignal,
  operation: string,
): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(
      new CancellationError(operation, { cause: signal.reason }),
    );
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () =>
      reject(new CancellationError(operation, { cause: signal.reason }));
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
