/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Base class for every error this package throws. Carries an optional
 * `cause` so that wrapped errors stay reachable through {@link isErrorInChain}.
 */
export class SteadyChatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A configuration value is missing or cannot be parsed.
 */
export class ConfigError extends SteadyChatError {
  readonly field: string;

  constructor(field: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.field = field;
  }
}

/**
 * The chat client could not be constructed within the allowed attempts or
 * before the construction timeout elapsed.
 */
export class ClientCreationError extends SteadyChatError {
  readonly attempts: number;
  readonly elapsedMs: number;
  readonly timedOut: boolean;

  constructor({
    attempts,
    elapsedMs,
    timedOut = false,
    cause,
  }: {
    attempts: number;
    elapsedMs: number;
    timedOut?: boolean;
    cause?: unknown;
  }) {
    const reason = timedOut
      ? `timed out after ${elapsedMs}ms`
      : `failed after ${attempts} attempt(s)`;
    super(
      `failed to create chat client: ${reason}${describeCause(cause)}`,
      { cause },
    );
    this.attempts = attempts;
    this.elapsedMs = elapsedMs;
    this.timedOut = timedOut;
  }
}

export type GenerationOperation = 'generate' | 'stream';

/**
 * A single call to the remote chat capability failed.
 */
export class GenerationError extends SteadyChatError {
  readonly operation: GenerationOperation;
  readonly elapsedMs: number;

  constructor(
    operation: GenerationOperation,
    elapsedMs: number,
    cause: unknown,
  ) {
    super(
      `${operation} failed after ${elapsedMs}ms${describeCause(cause)}`,
      { cause },
    );
    this.operation = operation;
    this.elapsedMs = elapsedMs;
  }
}

export type RetryStopReason = 'non-retryable' | 'attempts-exhausted';

/**
 * Retry orchestration gave up. `lastError` is the failure of the final
 * attempt and is also the `cause`.
 */
export class RetryExhaustedError extends SteadyChatError {
  readonly attempts: number;
  readonly reason: RetryStopReason;
  readonly lastError: unknown;

  constructor(attempts: number, reason: RetryStopReason, lastError: unknown) {
    super(
      `after ${attempts} attempt(s)${describeCause(lastError)}`,
      { cause: lastError },
    );
    this.attempts = attempts;
    this.reason = reason;
    this.lastError = lastError;
  }
}

/**
 * The retry loop ran out of iterations without returning or throwing.
 */
export class RetryInvariantError extends SteadyChatError {
  constructor(operation: string) {
    super(`${operation}: retry loop ended without a result`);
  }
}

/**
 * The caller's abort signal fired while we were waiting or streaming.
 */
export class CancellationError extends SteadyChatError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`${operation} canceled`, options);
  }
}

export type StreamErrorPhase = 'read' | 'write';

export class StreamError extends SteadyChatError {
  readonly phase: StreamErrorPhase;

  constructor(phase: StreamErrorPhase, cause: unknown) {
    super(`stream ${phase} error${describeCause(cause)}`, { cause });
    this.phase = phase;
  }
}

/**
 * Raised by a read on a chunk stream that has been closed.
 */
export class StreamClosedError extends SteadyChatError {
  constructor() {
    super('stream closed');
  }
}

/**
 * Walks `cause` links starting at `error` and returns the first error the
 * predicate accepts.
 */
export function findErrorInChain<T>(
  error: unknown,
  predicate: (candidate: unknown) => candidate is T,
): T | undefined {
  const visited = new Set<unknown>();
  let current: unknown = error;
  while (current !== undefined && current !== null && !visited.has(current)) {
    if (predicate(current)) {
      return current;
    }
    visited.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return undefined;
}

/**
 * Identity match anywhere in the `cause` chain.
 */
export function isErrorInChain(error: unknown, target: unknown): boolean {
  return (
    findErrorInChain(error, (candidate): candidate is unknown => {
      return candidate === target;
    }) !== undefined
  );
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}

function describeCause(cause: unknown): string {
  if (cause === undefined) {
    return '';
  }
  return `: ${getErrorMessage(cause)}`;
}
