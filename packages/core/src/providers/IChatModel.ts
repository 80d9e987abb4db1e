/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ChunkStream } from '../streaming/ChunkStream.js';
import type { Conversation, IMessage, IMessageChunk } from './IMessage.js';

export interface ChatCallOptions {
  signal?: AbortSignal;
}

/**
 * The remote generation capability. Implementations fail fast: they never
 * retry on their own and report transient network conditions by throwing
 * errors that implement `TransientFailure`.
 */
export interface ChatModel {
  readonly name: string;
  generate(
    conversation: Conversation,
    options?: ChatCallOptions,
  ): Promise<IMessage>;
  stream(
    conversation: Conversation,
    options?: ChatCallOptions,
  ): Promise<ChunkStream<IMessageChunk>>;
}
