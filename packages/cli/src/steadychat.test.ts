/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  CancellationError,
  ConfigError,
  ConfigurationManager,
  RetryExhaustedError,
} from '@steadychat/core';
import {
  EXIT_CONFIG_ERROR,
  EXIT_FAILURE,
  EXIT_SUCCESS,
  exitCodeFor,
  main,
} from './steadychat.js';
import { ScratchDir, createCapturedIO } from './test-utils/chatFixtures.js';

describe('exitCodeFor', () => {
  it('maps configuration errors to 2 and everything else to 1', () => {
    expect(exitCodeFor(new ConfigError('OPENAI_API_KEY', 'missing'))).toBe(
      EXIT_CONFIG_ERROR,
    );
    expect(exitCodeFor(new CancellationError('generate'))).toBe(EXIT_FAILURE);
    expect(
      exitCodeFor(new RetryExhaustedError(3, 'attempts-exhausted', 'boom')),
    ).toBe(EXIT_FAILURE);
    expect(exitCodeFor('boom')).toBe(EXIT_FAILURE);
  });
});

describe('main', () => {
  let scratch: ScratchDir;

  beforeEach(() => {
    scratch = new ScratchDir();
  });

  afterEach(() => {
    scratch.remove();
  });

  it('prints the reply and exits 0', async () => {
    const fakeResponses = scratch.turns('turns.jsonl', [
      { chunks: ['Keep ', 'going!'] },
    ]);
    const io = createCapturedIO();

    const exitCode = await main(
      ['--fake-responses', fakeResponses, '--mode', 'generate', 'Any', 'tips?'],
      io,
    );

    expect(exitCode).toBe(EXIT_SUCCESS);
    expect(io.stdoutText()).toBe('Keep going!\n');
    expect(io.stderrText()).toBe('');
  });

  it('exits 2 when the credential is missing', async () => {
    const io = createCapturedIO({ OPENAI_MODEL_NAME: 'test-model' });

    const exitCode = await main(
      ['--env-file', scratch.missing('.env'), '--mode', 'generate'],
      io,
    );

    expect(exitCode).toBe(EXIT_CONFIG_ERROR);
    expect(io.stderrText()).toBe(
      'steadychat: OPENAI_API_KEY environment variable is required\n',
    );
  });

  it('exits 2 on invalid arguments', async () => {
    const io = createCapturedIO();

    const exitCode = await main(['--max-attempts', '0'], io);

    expect(exitCode).toBe(EXIT_CONFIG_ERROR);
    expect(io.stderrText()).toBe(
      'steadychat: --max-attempts must be a positive integer\n',
    );
  });

  it('exits 1 when the model rejects the request', async () => {
    const fakeResponses = scratch.turns('turns.jsonl', [
      { error: { message: 'bad request' } },
    ]);
    const io = createCapturedIO();

    const exitCode = await main(
      ['--fake-responses', fakeResponses, '--mode', 'generate'],
      io,
    );

    expect(exitCode).toBe(EXIT_FAILURE);
    expect(io.stderrText()).toMatch(
      /^steadychat: after 1 attempt\(s\): generate failed after \d+ms: bad request\n$/,
    );
  });

  it('cancels a pending retry on SIGINT and removes its handler', async () => {
    const fakeResponses = scratch.turns('turns.jsonl', [
      { error: { message: 'connection reset', temporary: true } },
      { chunks: ['never sent'] },
    ]);
    const io = createCapturedIO();
    const before = process.listeners('SIGINT');

    const running = main(
      [
        '--fake-responses',
        fakeResponses,
        '--mode',
        'generate',
        '--retry-base-delay',
        '60000',
      ],
      io,
    );
    const added = process
      .listeners('SIGINT')
      .filter((listener) => !before.includes(listener));
    expect(added).toHaveLength(1);

    await vi.waitFor(() => {
      expect(io.stderrText()).toContain('retrying in 60.00s');
    });
    added[0]?.('SIGINT');

    await expect(running).resolves.toBe(EXIT_FAILURE);
    expect(io.stderrText()).toContain(
      'steadychat: generate retry canceled\n',
    );
    expect(io.stdoutText()).toBe('');
    expect(process.listeners('SIGINT')).toEqual(before);
  });

  it('turns on diagnostics with --debug', async () => {
    const fakeResponses = scratch.turns('turns.jsonl', [{ chunks: ['ok'] }]);
    const io = createCapturedIO();
    const consoleError = vi
      .spyOn(console, 'error')
      .mockImplementation(() => {});

    try {
      await main(
        ['--fake-responses', fakeResponses, '--mode', 'generate', '--debug'],
        io,
      );

      expect(ConfigurationManager.getInstance().getEffectiveConfig()).toMatchObject(
        { enabled: true, namespaces: ['steadychat:*'] },
      );
      expect(consoleError).toHaveBeenCalled();
    } finally {
      consoleError.mockRestore();
    }
  });
});
