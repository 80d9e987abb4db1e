/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import OpenAI, { type ClientOptions } from 'openai';
import type { ModelConfig } from '../../config/modelConfig.js';
import { DebugLogger } from '../../debug/index.js';
import { createDeadline, delay, raceWithSignal } from '../../utils/delay.js';
import { formatDuration } from '../../utils/duration.js';
import {
  CancellationError,
  ClientCreationError,
  getErrorMessage,
} from '../../utils/errors.js';
import type { ChatModel } from '../IChatModel.js';
import { OpenAIChatModel } from './OpenAIChatModel.js';

export const DEFAULT_RETRY_UNIT_MS = 1000;

export interface CreateChatModelOptions {
  /** Cancels construction with a CancellationError. */
  signal?: AbortSignal;
  /** Wait after failed attempt `n` (1-based) is `n * retryUnitMs`. */
  retryUnitMs?: number;
  createClient?: (options: ClientOptions) => OpenAI | Promise<OpenAI>;
}

const logger = DebugLogger.getLogger('steadychat:factory');

function instantiateClient(options: ClientOptions): OpenAI {
  return new OpenAI(options);
}

/**
 * Builds an OpenAI-backed {@link ChatModel}, retrying construction up to
 * `config.maxRetries` more times. The whole operation is bounded by
 * `config.timeoutMs`.
 *
 * @throws ClientCreationError when attempts run out or the deadline passes.
 * @throws CancellationError when `options.signal` aborts.
 */
export async function createOpenAIChatModel(
  config: ModelConfig,
  options: CreateChatModelOptions = {},
): Promise<ChatModel> {
  const retryUnitMs = options.retryUnitMs ?? DEFAULT_RETRY_UNIT_MS;
  const createClient = options.createClient ?? instantiateClient;
  const maxAttempts = config.maxRetries + 1;
  const clientOptions: ClientOptions = {
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    // Retries are ours.
    maxRetries: 0,
  };

  const startedAt = Date.now();
  const deadline = createDeadline(config.timeoutMs, options.signal);
  let attempts = 0;
  let lastError: unknown;

  try {
    while (attempts < maxAttempts) {
      if (attempts > 0) {
        await delay(attempts * retryUnitMs, deadline.signal, 'client creation');
      }
      if (deadline.signal.aborted) {
        throw new CancellationError('client creation', {
          cause: deadline.signal.reason,
        });
      }
      attempts++;

      try {
        const client = await raceWithSignal(
          Promise.resolve().then(() => createClient(clientOptions)),
          deadline.signal,
          'client creation',
        );
        if (attempts > 1) {
          logger.log(() => `chat client created on attempt ${attempts}`);
        }
        return new OpenAIChatModel(client, {
          model: config.model,
          temperature: config.temperature,
        });
      } catch (error) {
        if (error instanceof CancellationError) {
          throw error;
        }
        lastError = error;
        logger.warn(
          () =>
            `chat client creation attempt ${attempts}/${maxAttempts} failed: ${getErrorMessage(error)}`,
        );
      }
    }
  } catch (error) {
    if (deadline.timedOut()) {
      const elapsedMs = Date.now() - startedAt;
      logger.error(
        () => `chat client creation timed out after ${formatDuration(elapsedMs)}`,
      );
      throw new ClientCreationError({
        attempts,
        elapsedMs,
        timedOut: true,
        cause: lastError,
      });
    }
    throw error;
  } finally {
    deadline.dispose();
  }

  throw new ClientCreationError({
    attempts,
    elapsedMs: Date.now() - startedAt,
    cause: lastError,
  });
}
