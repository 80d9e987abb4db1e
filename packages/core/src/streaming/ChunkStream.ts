/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import { StreamClosedError, getErrorMessage } from '../utils/errors.js';

export type ChunkReadResult<T> =
  | { done: true }
  | { done: false; chunk: T | null };

export interface ChunkStreamOptions {
  /** Releases the underlying resource (socket, abort controller, ...). */
  onClose?: () => void;
}

/**
 * Pull-based reader over an incremental response.
 *
 * `close()` is idempotent and may be called from another task while a
 * `receiveNext()` is pending; the pending read then rejects promptly with
 * {@link StreamClosedError} instead of waiting for the source.
 */
export class ChunkStream<T> {
  private readonly logger = DebugLogger.getLogger('steadychat:stream');
  private readonly iterator: AsyncIterator<T | null | undefined>;
  private readonly onClose?: () => void;
  private closed = false;
  private autoClose = false;
  private interruptRead?: (error: Error) => void;

  constructor(
    iterator: AsyncIterator<T | null | undefined>,
    options: ChunkStreamOptions = {},
  ) {
    this.iterator = iterator;
    this.onClose = options.onClose;
  }

  static fromAsyncIterable<T>(
    source: AsyncIterable<T | null | undefined>,
    options?: ChunkStreamOptions,
  ): ChunkStream<T> {
    return new ChunkStream<T>(source[Symbol.asyncIterator](), options);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Release the underlying source automatically once end-of-stream or a
   * read error is reached.
   */
  setAutomaticClose(): void {
    this.autoClose = true;
  }

  async receiveNext(): Promise<ChunkReadResult<T>> {
    if (this.closed) {
      throw new StreamClosedError();
    }

    let result: IteratorResult<T | null | undefined>;
    try {
      result = await this.interruptible(this.iterator.next());
    } catch (error) {
      if (this.autoClose) {
        this.close();
      }
      throw error;
    }

    if (result.done) {
      if (this.autoClose) {
        this.close();
      }
      return { done: true };
    }
    return { done: false, chunk: result.value ?? null };
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const interrupt = this.interruptRead;
    this.interruptRead = undefined;
    interrupt?.(new StreamClosedError());

    try {
      this.onClose?.();
    } catch (error) {
      this.logger.warn(
        () => `stream release hook failed: ${getErrorMessage(error)}`,
      );
    }

    const returned = this.iterator.return?.();
    if (returned) {
      void returned.catch((error: unknown) => {
        this.logger.debug(
          () => `stream source cleanup failed: ${getErrorMessage(error)}`,
        );
      });
    }
  }

  private interruptible<R>(read: Promise<R>): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      this.interruptRead = reject;
      read.then(resolve, reject);
    }).finally(() => {
      this.interruptRead = undefined;
    });
  }
}
