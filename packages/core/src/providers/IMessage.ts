/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface IMessage {
  readonly role: MessageRole;
  readonly content: string;
  /** Id of the tool call a `tool` message answers. */
  readonly toolCallId?: string;
}

/**
 * Ordered dialogue sent to the model. Order is significant and is never
 * rearranged once assembled.
 */
export type Conversation = readonly IMessage[];

/**
 * One incremental fragment of a streamed reply. Empty content does not
 * terminate a stream.
 */
export interface IMessageChunk {
  readonly content?: string | null;
}

export function systemMessage(content: string): IMessage {
  return { role: 'system', content };
}

export function userMessage(content: string): IMessage {
  return { role: 'user', content };
}

export function assistantMessage(content: string): IMessage {
  return { role: 'assistant', content };
}
