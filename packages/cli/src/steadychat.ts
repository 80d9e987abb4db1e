/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { hideBin } from 'yargs/helpers';
import {
  ConfigError,
  ConfigurationManager,
  DebugLogger,
  getErrorMessage,
} from '@steadychat/core';
import { parseArguments } from './config/args.js';
import {
  runNonInteractiveChat,
  type ChatDependencies,
  type ChatIO,
} from './nonInteractiveChat.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;

const logger = DebugLogger.getLogger('steadychat:cli');

export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigError ? EXIT_CONFIG_ERROR : EXIT_FAILURE;
}

function reportFailure(io: ChatIO, error: unknown): void {
  io.stderr.write(`steadychat: ${getErrorMessage(error)}\n`);
}

/**
 * Runs one chat session and resolves to the process exit code. SIGINT
 * aborts whatever operation is in flight.
 */
export async function main(
  argv: string[] = hideBin(process.argv),
  io: ChatIO = {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
  },
  deps: ChatDependencies = {},
): Promise<number> {
  const abortController = new AbortController();
  const onInterrupt = () => {
    logger.debug('SIGINT received, cancelling');
    abortController.abort(new Error('interrupted'));
  };
  process.once('SIGINT', onInterrupt);

  try {
    const args = await parseArguments(argv);
    if (args.debug) {
      ConfigurationManager.getInstance().setCliConfig({
        enabled: true,
        namespaces: ['steadychat:*'],
      });
    }

    await runNonInteractiveChat(args, io, abortController.signal, deps);
    return EXIT_SUCCESS;
  } catch (error) {
    logger.debug(() => `session failed: ${getErrorMessage(error)}`);
    reportFailure(io, error);
    return exitCodeFor(error);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
