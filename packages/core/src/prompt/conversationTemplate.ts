/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  assistantMessage,
  systemMessage,
  userMessage,
  type Conversation,
  type IMessage,
} from '../providers/IMessage.js';
import { TemplateEngine } from './TemplateEngine.js';

export interface Persona {
  role: string;
  style: string;
}

export interface ConversationTemplate {
  /** Rendered with `role` and `style`. */
  system: string;
  /** Rendered with `question`. */
  user: string;
}

export const DEFAULT_TEMPLATE: Readonly<ConversationTemplate> =
  Object.freeze({
    system:
      'You are a {{role}}. Answer in a {{style}} tone. Your goal is to help programmers stay positive and optimistic, giving technical advice while also looking after their wellbeing.',
    user: 'Question: {{question}}',
  });

export const DEFAULT_PERSONA: Readonly<Persona> = Object.freeze({
  role: 'programmer encouragement coach',
  style: 'positive, warm and professional',
});

export const DEFAULT_QUESTION =
  "My code keeps throwing errors and I'm feeling really discouraged. What should I do?";

export const DEFAULT_HISTORY: Conversation = Object.freeze([
  userMessage('Hi'),
  assistantMessage(
    "Hey! I'm your programmer encouragement coach. Remember, every great programmer grew up through debugging. What can I help you with?",
  ),
  userMessage('I think the code I write is terrible'),
  assistantMessage(
    "Every programmer goes through this stage! What matters is that you keep learning and improving. Let's look at the code together; with some refactoring it will get better. Rome wasn't built in a day, and code quality grows through steady improvement.",
  ),
]);

export interface ConversationOptions {
  persona?: Partial<Persona>;
  history?: readonly IMessage[];
  question?: string;
  template?: Partial<ConversationTemplate>;
}

const engine = new TemplateEngine();

/**
 * Assembles the conversation sent to the model: the persona's system
 * message, then `history` in order, then the question as a user message.
 */
export function createMessagesFromTemplate(
  options: ConversationOptions = {},
): Conversation {
  const { persona, template } = options;
  const history = options.history ?? DEFAULT_HISTORY;
  const question = options.question ?? DEFAULT_QUESTION;

  return [
    systemMessage(
      engine.render(template?.system ?? DEFAULT_TEMPLATE.system, {
        role: persona?.role ?? DEFAULT_PERSONA.role,
        style: persona?.style ?? DEFAULT_PERSONA.style,
      }),
    ),
    ...history,
    userMessage(
      engine.render(template?.user ?? DEFAULT_TEMPLATE.user, { question }),
    ),
  ];
}
