/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type OpenAI from 'openai';
import { DebugLogger } from '../../debug/index.js';
import { ChunkStream } from '../../streaming/ChunkStream.js';
import type { ChatCallOptions, ChatModel } from '../IChatModel.js';
import {
  assistantMessage,
  type Conversation,
  type IMessage,
  type IMessageChunk,
} from '../IMessage.js';
import { toNetworkError } from './networkErrors.js';

export interface OpenAIChatModelOptions {
  model: string;
  temperature: number;
}

/**
 * ChatModel backed by the Chat Completions API. Fails fast: the SDK client
 * is expected to be built with `maxRetries: 0`.
 */
export class OpenAIChatModel implements ChatModel {
  readonly name: string;
  private readonly logger = DebugLogger.getLogger('steadychat:generate');
  private readonly client: OpenAI;
  private readonly options: OpenAIChatModelOptions;

  constructor(client: OpenAI, options: OpenAIChatModelOptions) {
    this.client = client;
    this.options = options;
    this.name = `openai:${options.model}`;
  }

  async generate(
    conversation: Conversation,
    options: ChatCallOptions = {},
  ): Promise<IMessage> {
    const completion = await this.client.chat.completions
      .create(
        {
          model: this.options.model,
          temperature: this.options.temperature,
          messages: conversation.map(toOpenAIMessage),
        },
        { signal: options.signal },
      )
      .catch((error: unknown) => {
        throw toNetworkError(error);
      });

    const choice = completion.choices[0];
    if (!choice) {
      this.logger.warn(() => `completion ${completion.id} had no choices`);
    }
    return assistantMessage(choice?.message.content ?? '');
  }

  async stream(
    conversation: Conversation,
    options: ChatCallOptions = {},
  ): Promise<ChunkStream<IMessageChunk>> {
    const response = await this.openStream(conversation, options.signal).catch(
      (error: unknown) => {
        throw toNetworkError(error);
      },
    );

    return ChunkStream.fromAsyncIterable(toMessageChunks(response), {
      onClose: () => response.controller.abort(),
    });
  }

  private openStream(conversation: Conversation, signal?: AbortSignal) {
    return this.client.chat.completions.create(
      {
        model: this.options.model,
        temperature: this.options.temperature,
        messages: conversation.map(toOpenAIMessage),
        stream: true,
      },
      { signal },
    );
  }
}

async function* toMessageChunks(
  source: AsyncIterable<OpenAI.Chat.ChatCompletionChunk>,
): AsyncGenerator<IMessageChunk> {
  try {
    for await (const chunk of source) {
      yield { content: chunk.choices[0]?.delta.content ?? null };
    }
  } catch (error) {
    throw toNetworkError(error);
  }
}

export function toOpenAIMessage(
  message: IMessage,
): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'tool':
      return {
        role: 'tool',
        content: message.content,
        tool_call_id: message.toolCallId ?? '',
      };
    default: {
      const unexpected: never = message.role;
      throw new Error(`unsupported message role: ${String(unexpected)}`);
    }
  }
}
