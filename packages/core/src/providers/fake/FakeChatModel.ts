/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ChunkStream } from '../../streaming/ChunkStream.js';
import { ConfigError } from '../../utils/errors.js';
import { NetworkError } from '../errors.js';
import type { ChatModel } from '../IChatModel.js';
import {
  assistantMessage,
  type IMessage,
  type IMessageChunk,
} from '../IMessage.js';

export const FakeTurnSchema = z.union([
  z.object({ chunks: z.array(z.string().nullable()) }).strict(),
  z
    .object({
      error: z.object({
        message: z.string(),
        timeout: z.boolean().optional(),
        temporary: z.boolean().optional(),
      }),
    })
    .strict(),
]);

/**
 * One canned model turn: either the chunks of a reply (null for an empty
 * chunk) or a network failure.
 */
export type FakeTurn = z.infer<typeof FakeTurnSchema>;

/**
 * A chat model that replays canned turns, one per `generate` or `stream`
 * call, in order.
 *
 * The JSONL form has one {@link FakeTurn} per line, for example:
 *
 * ```
 * {"error":{"message":"connection reset","temporary":true}}
 * {"chunks":["Keep ","going!"]}
 * ```
 */
export class FakeChatModel implements ChatModel {
  readonly name = 'fake';
  private readonly turns: readonly FakeTurn[];
  private callCounter = 0;

  constructor(turns: readonly FakeTurn[]) {
    this.turns = turns;
  }

  /**
   * @throws ConfigError when a line is not valid JSON or not a FakeTurn.
   */
  static fromFile(filePath: string): FakeChatModel {
    const raw = readFileSync(filePath, 'utf-8');
    const turns = raw.split('\n').flatMap((line, index) => {
      if (line.trim() === '') {
        return [];
      }
      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch (error) {
        throw new ConfigError(
          'fakeResponses',
          `${filePath}:${index + 1}: invalid JSON`,
          { cause: error },
        );
      }
      const parsed = FakeTurnSchema.safeParse(value);
      if (!parsed.success) {
        throw new ConfigError(
          'fakeResponses',
          `${filePath}:${index + 1}: not a fake turn`,
          { cause: parsed.error },
        );
      }
      return [parsed.data];
    });
    return new FakeChatModel(turns);
  }

  /** Number of turns consumed so far. */
  get calls(): number {
    return this.callCounter;
  }

  async generate(): Promise<IMessage> {
    const chunks = this.nextTurn();
    return assistantMessage(chunks.map((chunk) => chunk ?? '').join(''));
  }

  async stream(): Promise<ChunkStream<IMessageChunk>> {
    const chunks = this.nextTurn();
    return ChunkStream.fromAsyncIterable(replay(chunks));
  }

  private nextTurn(): Array<string | null> {
    const turnIndex = this.callCounter++;
    const turn = this.turns[turnIndex];
    if (!turn) {
      throw new Error(
        `FakeChatModel: no more canned responses (call #${turnIndex + 1}, only ${this.turns.length} turn(s) available)`,
      );
    }
    if ('error' in turn) {
      throw new NetworkError(turn.error.message, {
        timeout: turn.error.timeout,
        temporary: turn.error.temporary,
      });
    }
    return turn.chunks;
  }
}

async function* replay(
  chunks: ReadonlyArray<string | null>,
): AsyncGenerator<IMessageChunk> {
  for (const content of chunks) {
    yield { content };
  }
}
