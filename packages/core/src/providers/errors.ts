/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Capability implemented by boundary errors that describe a transient
 * network-layer condition. The retry classifier only looks for this
 * capability; it never inspects concrete error classes.
 */
export interface TransientFailure {
  isTimeout(): boolean;
  isTemporary(): boolean;
}

export function isTransientFailure(value: unknown): value is TransientFailure {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'isTimeout' in value &&
    typeof value.isTimeout === 'function' &&
    'isTemporary' in value &&
    typeof value.isTemporary === 'function'
  );
}

/**
 * Network-layer failure raised by chat model adapters.
 */
export class NetworkError extends Error implements TransientFailure {
  private readonly timeout: boolean;
  private readonly temporary: boolean;

  constructor(
    message: string,
    {
      timeout = false,
      temporary = false,
      cause,
    }: { timeout?: boolean; temporary?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause });
    this.name = 'NetworkError';
    this.timeout = timeout;
    this.temporary = temporary;
  }

  isTimeout(): boolean {
    return this.timeout;
  }

  isTemporary(): boolean {
    return this.temporary;
  }
}
