/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { DebugLogger } from '../debug/index.js';
import { MAX_TIMER_DELAY_MS } from '../utils/delay.js';
import { formatDuration, parseDuration } from '../utils/duration.js';
import { ConfigError } from '../utils/errors.js';
import type { ConfigSource } from './configSource.js';

const logger = DebugLogger.getLogger('steadychat:config');

export const DEFAULT_TEMPERATURE = 0;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MODEL_MAX_RETRIES = 3;

/**
 * Environment keys read by {@link loadModelConfig}, by config field.
 */
export const CONFIG_KEYS = {
  apiKey: 'OPENAI_API_KEY',
  model: 'OPENAI_MODEL_NAME',
  baseUrl: 'OPENAI_BASE_URL',
  temperature: 'OPENAI_TEMPERATURE',
  timeoutMs: 'OPENAI_TIMEOUT',
  maxRetries: 'OPENAI_MAX_RETRIES',
} as const;

export type ConfigField = keyof typeof CONFIG_KEYS;

export const ModelConfigSchema = z.object({
  apiKey: z.string().min(1, 'must not be empty'),
  model: z.string().min(1, 'must not be empty'),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  timeoutMs: z
    .number()
    .positive()
    .max(MAX_TIMER_DELAY_MS, `must be at most ${MAX_TIMER_DELAY_MS}ms`)
    .default(DEFAULT_TIMEOUT_MS),
  maxRetries: z.number().int().nonnegative().default(DEFAULT_MODEL_MAX_RETRIES),
});

export type ModelConfigInput = z.input<typeof ModelConfigSchema>;

/**
 * Validated client configuration. Frozen once produced.
 */
export type ModelConfig = Readonly<z.infer<typeof ModelConfigSchema>>;

function isConfigField(name: string): name is ConfigField {
  return Object.hasOwn(CONFIG_KEYS, name);
}

function validate(
  input: ModelConfigInput,
  describeField: (field: string) => string,
): ModelConfig {
  const result = ModelConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = String(issue?.path[0] ?? 'config');
    const label = describeField(field);
    if (issue?.code === 'invalid_type' && issue.received === 'undefined') {
      throw new ConfigError(label, `${label} is required`);
    }
    throw new ConfigError(
      label,
      `invalid ${label} value: ${issue?.message ?? 'validation failed'}`,
      { cause: result.error },
    );
  }
  return Object.freeze(result.data);
}

/**
 * Applies defaults to a programmatically supplied configuration and
 * validates it.
 *
 * @throws ConfigError naming the first offending field.
 */
export function resolveModelConfig(input: ModelConfigInput): ModelConfig {
  return validate(input, (field) => field);
}

const NUMBER = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;
const INTEGER = /^\d+$/;

/**
 * Reads `OPENAI_*` keys from `source`. Empty values count as absent.
 *
 * @throws ConfigError when a required key is missing or a value is
 *   malformed; the error's `field` is the offending key.
 */
export function loadModelConfig(source: ConfigSource): ModelConfig {
  const read = (key: string): string | undefined => {
    const value = source(key)?.trim();
    return value === undefined || value === '' ? undefined : value;
  };

  const apiKey = read(CONFIG_KEYS.apiKey);
  if (apiKey === undefined) {
    throw new ConfigError(
      CONFIG_KEYS.apiKey,
      `${CONFIG_KEYS.apiKey} environment variable is required`,
    );
  }
  const model = read(CONFIG_KEYS.model);
  if (model === undefined) {
    throw new ConfigError(
      CONFIG_KEYS.model,
      `${CONFIG_KEYS.model} environment variable is required`,
    );
  }

  const input: ModelConfigInput = {
    apiKey,
    model,
    baseUrl: read(CONFIG_KEYS.baseUrl),
    temperature: parseOptional(
      CONFIG_KEYS.temperature,
      read(CONFIG_KEYS.temperature),
      (raw) => (NUMBER.test(raw) ? Number(raw) : undefined),
      'is not a number',
    ),
    timeoutMs: parseOptional(
      CONFIG_KEYS.timeoutMs,
      read(CONFIG_KEYS.timeoutMs),
      parseDuration,
      'is not a duration (expected e.g. 30s, 1m30s or 500ms)',
    ),
    maxRetries: parseOptional(
      CONFIG_KEYS.maxRetries,
      read(CONFIG_KEYS.maxRetries),
      (raw) => (INTEGER.test(raw) ? Number(raw) : undefined),
      'is not a non-negative integer',
    ),
  };

  const config = validate(input, (field) =>
    isConfigField(field) ? CONFIG_KEYS[field] : field,
  );
  logger.debug(
    () =>
      `model config loaded: model=${config.model} baseUrl=${config.baseUrl ?? '(default)'} temperature=${config.temperature} timeout=${formatDuration(config.timeoutMs)} maxRetries=${config.maxRetries}`,
  );
  return config;
}

function parseOptional(
  key: string,
  raw: string | undefined,
  parse: (raw: string) => number | undefined,
  problem: string,
): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = parse(raw);
  if (value === undefined) {
    throw new ConfigError(key, `invalid ${key} value: "${raw}" ${problem}`);
  }
  return value;
}
