/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import type { IMessageChunk } from '../providers/IMessage.js';
import { formatDuration } from '../utils/duration.js';
import {
  CancellationError,
  StreamError,
  getErrorMessage,
} from '../utils/errors.js';
import type { ChunkReadResult, ChunkStream } from './ChunkStream.js';

/**
 * Destination for streamed text. A rejected promise or a thrown error is
 * reported as a write failure.
 */
export interface ChunkSink {
  write(text: string): void | Promise<void>;
}

export interface ReportStreamOptions {
  signal?: AbortSignal;
}

export interface StreamReport {
  /** Chunks forwarded to the sink. */
  chunks: number;
  /** Null or empty chunks that were skipped. */
  skipped: number;
  characters: number;
  elapsedMs: number;
}

const logger = DebugLogger.getLogger('steadychat:stream');

/**
 * Drains `stream` into `sink` until end-of-stream.
 *
 * A watcher scoped to this call closes the stream as soon as
 * `options.signal` aborts; the drain loop then stops at its next read and
 * this function rejects with a {@link CancellationError}. The watcher is
 * always stopped and awaited before returning.
 */
export async function reportStream(
  stream: ChunkStream<IMessageChunk>,
  sink: ChunkSink,
  options: ReportStreamOptions = {},
): Promise<StreamReport> {
  const { signal } = options;
  const startedAt = Date.now();
  const report: StreamReport = {
    chunks: 0,
    skipped: 0,
    characters: 0,
    elapsedMs: 0,
  };

  stream.setAutomaticClose();

  const done = new AbortController();
  const watcher = watchForCancellation(stream, done.signal, signal);

  try {
    for (;;) {
      if (signal?.aborted) {
        throw new CancellationError('stream', { cause: signal.reason });
      }

      let read: ChunkReadResult<IMessageChunk>;
      try {
        read = await stream.receiveNext();
      } catch (error) {
        if (signal?.aborted) {
          throw new CancellationError('stream', { cause: signal.reason });
        }
        throw new StreamError('read', error);
      }

      if (read.done) {
        report.elapsedMs = Date.now() - startedAt;
        logger.debug(
          () =>
            `stream drained: ${report.chunks} chunk(s), ${report.skipped} skipped, ${formatDuration(report.elapsedMs)}`,
        );
        return report;
      }

      const content = read.chunk?.content;
      if (!content) {
        report.skipped++;
        logger.debug(
          () => `skipping empty chunk #${report.chunks + report.skipped}`,
        );
        continue;
      }

      if (signal?.aborted) {
        throw new CancellationError('stream', { cause: signal.reason });
      }

      try {
        await sink.write(content);
      } catch (error) {
        throw new StreamError('write', error);
      }
      report.chunks++;
      report.characters += content.length;
    }
  } catch (error) {
    logger.warn(() => `stream ended early: ${getErrorMessage(error)}`);
    stream.close();
    throw error;
  } finally {
    done.abort();
    await watcher;
  }
}

/**
 * Resolves once either `done` or `cancel` fires. On cancellation the stream
 * is closed, which unblocks a read in flight.
 */
function watchForCancellation(
  stream: ChunkStream<IMessageChunk>,
  done: AbortSignal,
  cancel: AbortSignal | undefined,
): Promise<void> {
  return new Promise<void>((resolve) => {
    const finish = () => {
      done.removeEventListener('abort', finish);
      cancel?.removeEventListener('abort', onCancel);
      resolve();
    };
    const onCancel = () => {
      logger.debug('cancellation requested, closing stream');
      stream.close();
      finish();
    };

    if (cancel?.aborted) {
      onCancel();
      return;
    }
    done.addEventListener('abort', finish, { once: true });
    cancel?.addEventListener('abort', onCancel, { once: true });
  });
}

/**
 * Adapts a Node writable (such as `process.stdout`) to {@link ChunkSink}.
 * Each write resolves once the chunk has been handed to the OS.
 */
export function writableSink(writable: NodeJS.WritableStream): ChunkSink {
  return {
    write: (text: string) =>
      new Promise<void>((resolve, reject) => {
        writable.write(text, (error?: Error | null) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      }),
  };
}
