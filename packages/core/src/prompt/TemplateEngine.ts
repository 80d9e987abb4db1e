/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';

export type TemplateVariables = Readonly<
  Record<string, string | number | boolean | null | undefined>
>;

/**
 * Substitutes `{{NAME}}` placeholders. Whitespace inside the braces is
 * ignored. Unknown names are left in place so a missing variable shows up
 * in the rendered text; an unterminated `{{` is copied through verbatim.
 */
export class TemplateEngine {
  private readonly logger = DebugLogger.getLogger('steadychat:template');

  render(content: string, variables: TemplateVariables): string {
    let result = '';
    let position = 0;

    while (position < content.length) {
      const open = content.indexOf('{{', position);
      if (open === -1) {
        result += content.substring(position);
        break;
      }
      result += content.substring(position, open);

      const close = content.indexOf('}}', open + 2);
      if (close === -1) {
        result += content.substring(open);
        break;
      }

      const name = content.substring(open + 2, close).trim();
      const placeholder = content.substring(open, close + 2);
      // Nested "{{" means this opener is literal text.
      if (name.includes('{{')) {
        result += '{{';
        position = open + 2;
        continue;
      }

      if (name !== '' && Object.hasOwn(variables, name)) {
        const value = variables[name];
        result += value === null || value === undefined ? '' : String(value);
      } else {
        if (name !== '') {
          this.logger.warn(() => `template variable not provided: ${name}`);
        }
        result += placeholder;
      }
      position = close + 2;
    }

    return result;
  }
}
