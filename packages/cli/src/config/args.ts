/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import {
  ConfigError,
  DEFAULT_MAX_RETRIES,
  MAX_TIMER_DELAY_MS,
  maxBackoffDelayMs,
} from '@steadychat/core';

export const CHAT_MODES = ['generate', 'stream', 'both'] as const;
export type ChatMode = (typeof CHAT_MODES)[number];

export interface CliArgs {
  question: string | undefined;
  role: string | undefined;
  style: string | undefined;
  mode: ChatMode;
  envFile: string;
  retryBaseDelay: number | undefined;
  maxAttempts: number | undefined;
  fakeResponses: string | undefined;
  debug: boolean;
}

/**
 * Parses command line words (without the node and script entries).
 *
 * @throws ConfigError on unknown options or invalid values.
 */
export async function parseArguments(argv: string[]): Promise<CliArgs> {
  const result = await yargs(argv)
    .locale('en')
    .scriptName('steadychat')
    .usage(
      'Usage: $0 [options] [question..]\n\nAsk an OpenAI-compatible chat model a question, with retries and streaming.',
    )
    .parserConfiguration({ 'parse-positional-numbers': false })
    .option('role', {
      type: 'string',
      description: 'Persona the model should adopt',
    })
    .option('style', {
      type: 'string',
      description: 'Tone of the answer',
    })
    .option('mode', {
      choices: CHAT_MODES,
      default: 'both' as const,
      description: 'Run a single-shot generation, a streamed one, or both',
    })
    .option('env-file', {
      type: 'string',
      default: '.env',
      description: 'File with OPENAI_* settings; the environment wins',
    })
    .option('retry-base-delay', {
      type: 'number',
      description: 'Backoff unit in milliseconds between attempts',
    })
    .option('max-attempts', {
      type: 'number',
      description: 'Calls allowed per operation, including the first',
    })
    .option('fake-responses', {
      type: 'string',
      description: 'Replay canned turns from a JSONL file instead of calling the API',
    })
    .option('debug', {
      alias: 'd',
      type: 'boolean',
      default: false,
      description: 'Print steadychat diagnostics to stderr',
    })
    .help()
    .alias('h', 'help')
    .version(false)
    .strict()
    .check((args) => {
      const delay = args['retry-base-delay'];
      if (delay !== undefined && (!Number.isFinite(delay) || delay < 0)) {
        throw new Error('--retry-base-delay must be a non-negative number');
      }
      const attempts = args['max-attempts'];
      if (
        attempts !== undefined &&
        (!Number.isInteger(attempts) || attempts < 1)
      ) {
        throw new Error('--max-attempts must be a positive integer');
      }
      if (
        delay !== undefined &&
        maxBackoffDelayMs(attempts ?? DEFAULT_MAX_RETRIES, delay) >
          MAX_TIMER_DELAY_MS
      ) {
        throw new Error(
          `--retry-base-delay times (--max-attempts - 1) must be at most ${MAX_TIMER_DELAY_MS}ms`,
        );
      }
      return true;
    })
    .fail((message, error) => {
      throw new ConfigError('arguments', error?.message ?? message, {
        cause: error,
      });
    })
    .parseAsync();

  const words = result._.map(String).filter((word) => word.trim() !== '');

  return {
    question: words.length > 0 ? words.join(' ') : undefined,
    role: result.role,
    style: result.style,
    mode: result.mode,
    envFile: result['env-file'],
    retryBaseDelay: result['retry-base-delay'],
    maxAttempts: result['max-attempts'],
    fakeResponses: result['fake-responses'],
    debug: result.debug,
  };
}
