/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { RetryOrchestrator } from '../../generation/RetryOrchestrator.js';
import { reportStream } from '../../streaming/reportStream.js';
import { ConfigError } from '../../utils/errors.js';
import { NetworkError } from '../errors.js';
import { userMessage } from '../IMessage.js';
import { FakeChatModel } from './FakeChatModel.js';

const conversation = [userMessage('Hello?')];

describe('FakeChatModel', () => {
  it('replays turns in order across generate and stream', async () => {
    const model = new FakeChatModel([
      { chunks: ['Hello', ' there'] },
      { chunks: ['A', null, 'B'] },
    ]);

    await expect(model.generate()).resolves.toEqual({
      role: 'assistant',
      content: 'Hello there',
    });

    const writes: string[] = [];
    const report = await reportStream(await model.stream(), {
      write: (text) => {
        writes.push(text);
      },
    });
    expect(writes).toEqual(['A', 'B']);
    expect(report.skipped).toBe(1);
    expect(model.calls).toBe(2);
  });

  it('throws the scripted network error', async () => {
    const model = new FakeChatModel([
      { error: { message: 'upstream timed out', timeout: true } },
    ]);

    const error = await model.generate().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toHaveProperty('message', 'upstream timed out');
    if (error instanceof NetworkError) {
      expect(error.isTimeout()).toBe(true);
      expect(error.isTemporary()).toBe(false);
    }
  });

  it('fails once the script runs out', async () => {
    const model = new FakeChatModel([]);

    await expect(model.stream()).rejects.toThrow(
      'FakeChatModel: no more canned responses (call #1, only 0 turn(s) available)',
    );
  });

  it('drives the retry orchestrator deterministically', async () => {
    const model = new FakeChatModel([
      { error: { message: 'connection reset', temporary: true } },
      { chunks: ['Recovered.'] },
    ]);
    const orchestrator = new RetryOrchestrator(model, { baseDelayMs: 1 });

    const reply = await orchestrator.generate(conversation);

    expect(reply.content).toBe('Recovered.');
    expect(model.calls).toBe(2);
  });

  describe('fromFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'steadychat-fake-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('reads one turn per non-blank line', async () => {
      const path = join(dir, 'turns.jsonl');
      writeFileSync(
        path,
        [
          '{"error":{"message":"connection reset","temporary":true}}',
          '',
          '{"chunks":["Keep ","going!"]}',
          '',
        ].join('\n'),
      );

      const model = FakeChatModel.fromFile(path);

      await expect(model.generate()).rejects.toBeInstanceOf(NetworkError);
      await expect(model.generate()).resolves.toHaveProperty(
        'content',
        'Keep going!',
      );
    });

    it('reports the line of invalid JSON', () => {
      const path = join(dir, 'broken.jsonl');
      writeFileSync(path, '{"chunks":["ok"]}\n{"chunks":\n');

      expect(() => FakeChatModel.fromFile(path)).toThrow(
        new ConfigError('fakeResponses', `${path}:2: invalid JSON`),
      );
    });

    it('rejects lines that are not turns', () => {
      const path = join(dir, 'wrong.jsonl');
      writeFileSync(path, '{"text":"hello"}\n');

      expect(() => FakeChatModel.fromFile(path)).toThrow(
        `${path}:1: not a fake turn`,
      );
    });
  });
});
