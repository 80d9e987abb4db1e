/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import type { ChatCallOptions, ChatModel } from '../providers/IChatModel.js';
import type {
  Conversation,
  IMessage,
  IMessageChunk,
} from '../providers/IMessage.js';
import type { ChunkStream } from '../streaming/ChunkStream.js';
import { formatDuration } from '../utils/duration.js';
import { GenerationError, getErrorMessage } from '../utils/errors.js';

const logger = DebugLogger.getLogger('steadychat:generate');

/**
 * Calls the model exactly once and returns its reply.
 *
 * @throws GenerationError with the model's error as `cause`.
 */
export async function generate(
  model: ChatModel,
  conversation: Conversation,
  options: ChatCallOptions = {},
): Promise<IMessage> {
  const startedAt = Date.now();
  try {
    const reply = await model.generate(conversation, options);
    const elapsedMs = Date.now() - startedAt;
    logger.debug(
      () =>
        `${model.name} generate took ${formatDuration(elapsedMs)} (${reply.content.length} chars)`,
    );
    return reply;
  } catch (error) {
    const elapsedMs = Date.now() - startedAt;
    logger.debug(
      () =>
        `${model.name} generate failed after ${formatDuration(elapsedMs)}: ${getErrorMessage(error)}`,
    );
    throw new GenerationError('generate', elapsedMs, error);
  }
}

/**
 * Starts one streamed generation. The elapsed time covers establishing the
 * stream only; draining is the caller's job.
 *
 * @throws GenerationError with the model's error as `cause`.
 */
export async function stream(
  model: ChatModel,
  conversation: Conversation,
  options: ChatCallOptions = {},
): Promise<ChunkStream<IMessageChunk>> {
  const startedAt = Date.now();
  try {
    const chunks = await model.stream(conversation, options);
    logger.debug(
      () =>
        `${model.name} stream opened in ${formatDuration(Date.now() - startedAt)}`,
    );
    return chunks;
  } catch (error) {
    const elapsedMs = Date.now() - startedAt;
    logger.debug(
      () =>
        `${model.name} stream failed after ${formatDuration(elapsedMs)}: ${getErrorMessage(error)}`,
    );
    throw new GenerationError('stream', elapsedMs, error);
  }
}
