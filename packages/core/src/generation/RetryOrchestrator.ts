/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 *
 * RetryOrchestrator wraps a ChatModel with bounded linear-backoff retries.
 *
 * - Models throw immediately on errors (fast-fail)
 * - Classification and waiting happen here, never in the model
 * - Only the establishment of a stream is retried; chunks already handed to
 *   the caller are never replayed
 */

import { DebugLogger } from '../debug/index.js';
import type { ChatCallOptions, ChatModel } from '../providers/IChatModel.js';
import type {
  Conversation,
  IMessage,
  IMessageChunk,
} from '../providers/IMessage.js';
import type { ChunkStream } from '../streaming/ChunkStream.js';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_BASE_DELAY_MS,
  isRetryableError,
  retryWithBackoff,
  type RetryAttempt,
} from '../utils/retry.js';
import { generate, stream } from './generate.js';

export interface RetryOrchestratorConfig {
  /** Total calls allowed per operation (default: 3) */
  maxRetries?: number;
  /** Backoff unit in ms (default: 1000) */
  baseDelayMs?: number;
  /** Decides whether a failure is worth another attempt */
  isRetryable?: (error: unknown) => boolean;
  /** Observer invoked before each wait */
  onRetry?: (attempt: RetryAttempt) => void;
}

export class RetryOrchestrator implements ChatModel {
  readonly name: string;
  readonly wrappedModel: ChatModel;
  private readonly logger = DebugLogger.getLogger('steadychat:retry');
  private readonly config: Required<Omit<RetryOrchestratorConfig, 'onRetry'>> &
    Pick<RetryOrchestratorConfig, 'onRetry'>;

  constructor(model: ChatModel, config?: RetryOrchestratorConfig) {
    this.wrappedModel = model;
    this.name = model.name;

    this.config = {
      maxRetries: config?.maxRetries ?? DEFAULT_MAX_RETRIES,
      baseDelayMs: config?.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS,
      isRetryable: config?.isRetryable ?? isRetryableError,
      onRetry: config?.onRetry,
    };
  }

  /**
   * @throws RetryExhaustedError whose `lastError` is a GenerationError.
   * @throws CancellationError when `options.signal` aborts.
   */
  async generate(
    conversation: Conversation,
    options: ChatCallOptions = {},
  ): Promise<IMessage> {
    return retryWithBackoff(
      (attempt) => {
        this.logger.debug(
          () => `generate attempt ${attempt + 1}/${this.config.maxRetries}`,
        );
        return generate(this.wrappedModel, conversation, options);
      },
      { ...this.config, signal: options.signal, operation: 'generate' },
    );
  }

  /**
   * @throws RetryExhaustedError whose `lastError` is a GenerationError.
   * @throws CancellationError when `options.signal` aborts.
   */
  async stream(
    conversation: Conversation,
    options: ChatCallOptions = {},
  ): Promise<ChunkStream<IMessageChunk>> {
    return retryWithBackoff(
      (attempt) => {
        this.logger.debug(
          () => `stream attempt ${attempt + 1}/${this.config.maxRetries}`,
        );
        return stream(this.wrappedModel, conversation, options);
      },
      { ...this.config, signal: options.signal, operation: 'stream' },
    );
  }
}
