/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import { ConfigurationManager } from './ConfigurationManager.js';
import type { DebugLevel } from './types.js';

// stdout carries streamed model output, so diagnostics always go to stderr
// and never use colors.
if (createDebug.inspectOpts) {
  createDebug.inspectOpts.colors = false;
}
createDebug.log = (...args: unknown[]) => {
  console.error(...args);
};

const LEVEL_RANK: Record<DebugLevel, number> = {
  debug: 0,
  log: 1,
  warn: 2,
  error: 3,
};

export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private debugInstance: Debugger;
  private _namespace: string;
  private _configManager: ConfigurationManager;
  private _enabled: boolean;
  private boundOnConfigChange: () => void;

  /**
   * Returns the cached logger for `namespace`, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  constructor(
    namespace: string,
    configManager: ConfigurationManager = ConfigurationManager.getInstance(),
  ) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    // Gating is ours; the debug package only formats and writes.
    this.debugInstance.enabled = true;
    this._configManager = configManager;
    this._enabled = this.checkEnabled();
    this.boundOnConfigChange = () => this.onConfigChange();
    this._configManager.subscribe(this.boundOnConfigChange);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  log(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('log', messageOrFn, args);
  }

  debug(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  warn(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  private write(
    level: DebugLevel,
    messageOrFn: string | (() => string),
    args: unknown[],
  ): void {
    if (!this._enabled) {
      return; // Zero overhead - no processing when disabled
    }

    const threshold = this._configManager.getEffectiveConfig().level;
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    message = this.redactSensitive(message);
    this.debugInstance('[%s] %s', level.toUpperCase(), message, ...args);
  }

  checkEnabled(): boolean {
    const config = this._configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }

    for (const pattern of config.namespaces) {
      if (this.matchesPattern(this._namespace, pattern)) {
        return true;
      }
    }

    return false;
  }

  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace) {
      return true;
    }

    if (pattern.includes('*')) {
      const regexPattern = pattern
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '.*');

      const regex = new RegExp(`^${regexPattern}$`);
      return regex.test(namespace);
    }

    return false;
  }

  private redactSensitive(message: string): string {
    const patterns = this._configManager.getRedactPatterns();
    let result = message;

    for (const pattern of patterns) {
      const regex = new RegExp(`${pattern}["']?:\\s*["']?([^"'\\s]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }

    return result;
  }

  private onConfigChange(): void {
    this._enabled = this.checkEnabled();
  }

  dispose(): void {
    this._configManager.unsubscribe(this.boundOnConfigChange);
    if (DebugLogger.instances.get(this._namespace) === this) {
      DebugLogger.instances.delete(this._namespace);
    }
  }
}
