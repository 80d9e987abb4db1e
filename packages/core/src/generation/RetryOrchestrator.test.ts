/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 *
 * Behavioral tests: scripted models, real (short) waits.
 */

import { describe, expect, it, vi } from 'vitest';
import { NetworkError } from '../providers/errors.js';
import type { ChatModel } from '../providers/IChatModel.js';
import {
  assistantMessage,
  userMessage,
  type IMessageChunk,
} from '../providers/IMessage.js';
import { ChunkStream } from '../streaming/ChunkStream.js';
import { reportStream } from '../streaming/reportStream.js';
import {
  CancellationError,
  GenerationError,
  RetryExhaustedError,
  StreamError,
  isErrorInChain,
} from '../utils/errors.js';
import type { RetryAttempt } from '../utils/retry.js';
import { RetryOrchestrator } from './RetryOrchestrator.js';

const conversation = [userMessage('Any tips for flaky tests?')];

type Outcome = 'ok' | Error;

/**
 * Test helper: a model that plays one outcome per call and repeats the
 * last one once the script runs out.
 */
function createScriptedModel(
  outcomes: Outcome[],
  chunks: () => AsyncGenerator<IMessageChunk> = async function* () {
    yield { content: 'Isolate them first.' };
  },
) {
  let calls = 0;
  const next = (): Outcome => {
    const outcome = outcomes[Math.min(calls, outcomes.length - 1)] ?? 'ok';
    calls++;
    return outcome;
  };
  const model = {
    name: 'scripted',
    generate: vi.fn(async () => {
      const outcome = next();
      if (outcome !== 'ok') {
        throw outcome;
      }
      return assistantMessage('Isolate them first.');
    }),
    stream: vi.fn(async () => {
      const outcome = next();
      if (outcome !== 'ok') {
        throw outcome;
      }
      return ChunkStream.fromAsyncIterable(chunks());
    }),
  } satisfies ChatModel;
  return model;
}

function temporary(message = 'connection reset'): NetworkError {
  return new NetworkError(message, { temporary: true });
}

describe('RetryOrchestrator', () => {
  it('keeps the wrapped model name', () => {
    const model = createScriptedModel(['ok']);
    expect(new RetryOrchestrator(model).name).toBe('scripted');
  });

  describe('generate', () => {
    it('retries a temporary failure once and returns the success', async () => {
      const model = createScriptedModel([temporary(), 'ok']);
      const orchestrator = new RetryOrchestrator(model, { baseDelayMs: 1 });

      const reply = await orchestrator.generate(conversation);

      expect(reply.content).toBe('Isolate them first.');
      expect(model.generate).toHaveBeenCalledTimes(2);
    });

    it('stops after one call on a non-retryable failure', async () => {
      const original = new Error('401 invalid api key');
      const model = createScriptedModel([original]);
      const orchestrator = new RetryOrchestrator(model, { baseDelayMs: 1 });

      const error = await orchestrator
        .generate(conversation)
        .catch((caught: unknown) => caught);

      expect(model.generate).toHaveBeenCalledOnce();
      expect(error).toBeInstanceOf(RetryExhaustedError);
      expect(error).toHaveProperty('lastError', expect.any(GenerationError));
      expect(isErrorInChain(error, original)).toBe(true);
    });

    it('honors the configured attempt budget', async () => {
      const model = createScriptedModel([temporary()]);
      const orchestrator = new RetryOrchestrator(model, {
        maxRetries: 2,
        baseDelayMs: 1,
      });

      await expect(orchestrator.generate(conversation)).rejects.toMatchObject({
        attempts: 2,
        reason: 'attempts-exhausted',
      });
      expect(model.generate).toHaveBeenCalledTimes(2);
    });

    it('reports retries to the observer', async () => {
      const seen: RetryAttempt[] = [];
      const model = createScriptedModel([temporary(), temporary(), 'ok']);
      const orchestrator = new RetryOrchestrator(model, {
        baseDelayMs: 1,
        onRetry: (attempt) => seen.push(attempt),
      });

      await orchestrator.generate(conversation);

      expect(seen.map((attempt) => attempt.attempt)).toEqual([0, 1]);
      expect(seen[0]?.error).toBeInstanceOf(GenerationError);
    });

    it('uses a custom classifier', async () => {
      const model = createScriptedModel([new Error('overloaded'), 'ok']);
      const orchestrator = new RetryOrchestrator(model, {
        baseDelayMs: 1,
        isRetryable: (error) =>
          error instanceof GenerationError &&
          error.message.includes('overloaded'),
      });

      await expect(orchestrator.generate(conversation)).resolves.toMatchObject(
        { role: 'assistant' },
      );
      expect(model.generate).toHaveBeenCalledTimes(2);
    });

    it('passes the caller signal to the model', async () => {
      const controller = new AbortController();
      const model = createScriptedModel(['ok']);

      await new RetryOrchestrator(model).generate(conversation, {
        signal: controller.signal,
      });

      expect(model.generate).toHaveBeenCalledWith(conversation, {
        signal: controller.signal,
      });
    });

    it('throws CancellationError when canceled while waiting', async () => {
      const controller = new AbortController();
      const model = createScriptedModel([temporary(), 'ok']);
      const orchestrator = new RetryOrchestrator(model, {
        baseDelayMs: 60_000,
        onRetry: () => controller.abort(),
      });

      await expect(
        orchestrator.generate(conversation, { signal: controller.signal }),
      ).rejects.toBeInstanceOf(CancellationError);
      expect(model.generate).toHaveBeenCalledOnce();
    });
  });

  describe('stream', () => {
    it('retries the establishment of a stream', async () => {
      const model = createScriptedModel([
        new NetworkError('timed out', { timeout: true }),
        'ok',
      ]);
      const orchestrator = new RetryOrchestrator(model, { baseDelayMs: 1 });

      const stream = await orchestrator.stream(conversation);

      await expect(stream.receiveNext()).resolves.toEqual({
        done: false,
        chunk: { content: 'Isolate them first.' },
      });
      expect(model.stream).toHaveBeenCalledTimes(2);
    });

    it('never reopens a stream that fails while being read', async () => {
      const model = createScriptedModel(['ok'], async function* () {
        yield { content: 'Isolate ' };
        throw temporary('reset mid-stream');
      });
      const orchestrator = new RetryOrchestrator(model, { baseDelayMs: 1 });
      const writes: string[] = [];

      const stream = await orchestrator.stream(conversation);
      const error = await reportStream(stream, {
        write: (text) => {
          writes.push(text);
        },
      }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(StreamError);
      expect(writes).toEqual(['Isolate ']);
      expect(model.stream).toHaveBeenCalledOnce();
    });

    it('wraps the last establishment failure', async () => {
      const model = createScriptedModel([temporary('refused')]);
      const orchestrator = new RetryOrchestrator(model, {
        maxRetries: 3,
        baseDelayMs: 1,
      });

      const error = await orchestrator
        .stream(conversation)
        .catch((caught: unknown) => caught);

      expect(error).toMatchObject({ attempts: 3, reason: 'attempts-exhausted' });
      expect(error).toHaveProperty(
        'lastError',
        expect.objectContaining({ operation: 'stream' }),
      );
      expect(model.stream).toHaveBeenCalledTimes(3);
    });
  });
});
