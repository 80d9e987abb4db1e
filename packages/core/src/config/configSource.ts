/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as dotenv from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { DebugLogger } from '../debug/index.js';
import { ConfigError, getErrorMessage } from '../utils/errors.js';

const logger = DebugLogger.getLogger('steadychat:config');

/**
 * Key lookup used by the config loader.
 */
export type ConfigSource = (key: string) => string | undefined;

export function envConfigSource(
  env: NodeJS.ProcessEnv = process.env,
): ConfigSource {
  return (key) => env[key];
}

/**
 * Layers a `.env` file under `fallback`. A missing file is not an error; a
 * value from `fallback` wins unless it is empty.
 *
 * @throws ConfigError when the file exists but cannot be read.
 */
export function dotenvConfigSource(
  path: string,
  fallback: ConfigSource = envConfigSource(),
): ConfigSource {
  if (!existsSync(path)) {
    logger.debug(() => `no env file at ${path}`);
    return fallback;
  }

  let parsed: Record<string, string>;
  try {
    parsed = dotenv.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      'envFile',
      `cannot read env file ${path}: ${getErrorMessage(error)}`,
      { cause: error },
    );
  }
  logger.debug(
    () => `loaded ${Object.keys(parsed).length} key(s) from ${path}`,
  );

  return (key) => {
    const value = fallback(key);
    if (value !== undefined && value !== '') {
      return value;
    }
    return Object.hasOwn(parsed, key) ? parsed[key] : value;
  };
}
