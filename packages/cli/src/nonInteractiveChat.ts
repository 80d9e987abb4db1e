/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DebugLogger,
  FakeChatModel,
  RetryOrchestrator,
  createMessagesFromTemplate,
  createOpenAIChatModel,
  dotenvConfigSource,
  envConfigSource,
  formatDuration,
  getErrorMessage,
  loadModelConfig,
  reportStream,
  writableSink,
  type ChatModel,
  type IMessage,
  type ModelConfig,
  type RetryAttempt,
  type StreamReport,
} from '@steadychat/core';
import type { CliArgs } from './config/args.js';

export interface ChatIO {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env: NodeJS.ProcessEnv;
}

export interface ChatDependencies {
  /** Replaces the OpenAI client factory, mainly for tests. */
  createModel?: (
    config: ModelConfig,
    signal: AbortSignal,
  ) => Promise<ChatModel>;
}

export interface ChatOutcome {
  reply?: IMessage;
  report?: StreamReport;
}

const logger = DebugLogger.getLogger('steadychat:cli');

/**
 * Builds the model, assembles the conversation and runs the generation
 * and/or stream the mode asks for. Replies go to `io.stdout`; retry notices
 * go to `io.stderr`.
 */
export async function runNonInteractiveChat(
  args: CliArgs,
  io: ChatIO,
  signal: AbortSignal,
  deps: ChatDependencies = {},
): Promise<ChatOutcome> {
  const model = await buildModel(args, io.env, signal, deps);
  const orchestrator = new RetryOrchestrator(model, {
    maxRetries: args.maxAttempts ?? DEFAULT_MAX_RETRIES,
    baseDelayMs: args.retryBaseDelay ?? DEFAULT_RETRY_BASE_DELAY_MS,
    onRetry: (attempt: RetryAttempt) => {
      io.stderr.write(
        `attempt ${attempt.attempt + 1} failed: ${getErrorMessage(attempt.error)}; retrying in ${formatDuration(attempt.delayMs)}\n`,
      );
    },
  });

  const conversation = createMessagesFromTemplate({
    persona: { role: args.role, style: args.style },
    question: args.question,
  });
  logger.debug(
    () =>
      `sending ${conversation.length} message(s) to ${orchestrator.name} in ${args.mode} mode`,
  );

  const outcome: ChatOutcome = {};
  const sink = writableSink(io.stdout);

  if (args.mode === 'generate' || args.mode === 'both') {
    outcome.reply = await orchestrator.generate(conversation, { signal });
    await sink.write(`${outcome.reply.content}\n`);
  }

  if (args.mode === 'stream' || args.mode === 'both') {
    const chunks = await orchestrator.stream(conversation, { signal });
    outcome.report = await reportStream(chunks, sink, { signal });
    await sink.write('\n');
  }

  return outcome;
}

async function buildModel(
  args: CliArgs,
  env: NodeJS.ProcessEnv,
  signal: AbortSignal,
  deps: ChatDependencies,
): Promise<ChatModel> {
  if (args.fakeResponses) {
    logger.debug(() => `replaying canned turns from ${args.fakeResponses}`);
    return FakeChatModel.fromFile(args.fakeResponses);
  }

  const config = loadModelConfig(
    dotenvConfigSource(args.envFile, envConfigSource(env)),
  );
  if (deps.createModel) {
    return deps.createModel(config, signal);
  }
  return createOpenAIChatModel(config, { signal });
}
