/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import OpenAI from 'openai';
import { describe, expect, it, vi } from 'vitest';
import { resolveModelConfig } from '../../config/modelConfig.js';
import {
  CancellationError,
  ClientCreationError,
} from '../../utils/errors.js';
import { createOpenAIChatModel } from './createOpenAIChatModel.js';
import { OpenAIChatModel } from './OpenAIChatModel.js';

const config = resolveModelConfig({
  apiKey: 'test-secret',
  model: 'test-model',
  baseUrl: 'http://localhost:8080/v1',
  timeoutMs: 1000,
  maxRetries: 2,
});

function realClient(): OpenAI {
  return new OpenAI({ apiKey: 'test-secret', baseURL: 'http://localhost' });
}

/**
 * Test helper: a client constructor that fails a given number of times.
 */
function flakyConstructor(failures: number) {
  let calls = 0;
  return vi.fn(() => {
    calls++;
    if (calls <= failures) {
      throw new Error(`construction failure ${calls}`);
    }
    return realClient();
  });
}

describe('createOpenAIChatModel', () => {
  it('builds the SDK client without internal retries', async () => {
    const createClient = vi.fn(realClient);

    const model = await createOpenAIChatModel(config, { createClient });

    expect(model).toBeInstanceOf(OpenAIChatModel);
    expect(model.name).toBe('openai:test-model');
    expect(createClient).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'http://localhost:8080/v1',
      timeout: 1000,
      maxRetries: 0,
    });
  });

  it('constructs a real client by default', async () => {
    await expect(createOpenAIChatModel(config)).resolves.toBeInstanceOf(
      OpenAIChatModel,
    );
  });

  it('retries construction failures', async () => {
    const createClient = flakyConstructor(2);

    const model = await createOpenAIChatModel(config, {
      createClient,
      retryUnitMs: 1,
    });

    expect(model).toBeInstanceOf(OpenAIChatModel);
    expect(createClient).toHaveBeenCalledTimes(3);
  });

  it('fails with ClientCreationError once attempts run out', async () => {
    const createClient = flakyConstructor(Number.POSITIVE_INFINITY);

    const error = await createOpenAIChatModel(config, {
      createClient,
      retryUnitMs: 1,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ClientCreationError);
    expect(error).toMatchObject({ attempts: 3, timedOut: false });
    expect(error).toHaveProperty(
      'message',
      'failed to create chat client: failed after 3 attempt(s): construction failure 3',
    );
    expect(createClient).toHaveBeenCalledTimes(3);
  });

  it('fails with a timed-out ClientCreationError when construction hangs', async () => {
    const createClient = vi.fn(() => new Promise<OpenAI>(() => {}));

    const error = await createOpenAIChatModel(
      { ...config, timeoutMs: 20 },
      { createClient },
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ClientCreationError);
    expect(error).toMatchObject({ attempts: 1, timedOut: true });
  });

  it('stops retrying when the deadline passes during a wait', async () => {
    const createClient = flakyConstructor(Number.POSITIVE_INFINITY);

    const error = await createOpenAIChatModel(
      { ...config, timeoutMs: 20 },
      { createClient, retryUnitMs: 60_000 },
    ).catch((caught: unknown) => caught);

    expect(error).toMatchObject({ attempts: 1, timedOut: true });
    expect(error).toHaveProperty('cause.message', 'construction failure 1');
    expect(createClient).toHaveBeenCalledOnce();
  });

  it('throws CancellationError when the caller aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    const createClient = vi.fn(realClient);

    await expect(
      createOpenAIChatModel(config, {
        createClient,
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(CancellationError);
    expect(createClient).not.toHaveBeenCalled();
  });
});
