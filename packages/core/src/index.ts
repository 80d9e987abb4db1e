/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Export config
export * from './config/modelConfig.js';
export * from './config/configSource.js';

// Export model contracts and adapters
export * from './providers/IMessage.js';
export * from './providers/IChatModel.js';
export * from './providers/errors.js';
export * from './providers/openai/OpenAIChatModel.js';
export * from './providers/openai/createOpenAIChatModel.js';
export * from './providers/openai/networkErrors.js';
export * from './providers/fake/FakeChatModel.js';

// Export generation
export * from './generation/generate.js';
export * from './generation/RetryOrchestrator.js';

// Export streaming
export * from './streaming/ChunkStream.js';
export * from './streaming/reportStream.js';

// Export prompt assembly
export * from './prompt/TemplateEngine.js';
export * from './prompt/conversationTemplate.js';

// Export utilities
export * from './utils/errors.js';
export * from './utils/retry.js';
export * from './utils/delay.js';
export * from './utils/duration.js';

// Export debug
export * from './debug/index.js';
