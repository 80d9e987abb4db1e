/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { DebugLevel, DebugSettings } from './types.js';

const LEVELS: readonly DebugLevel[] = ['debug', 'log', 'warn', 'error'];

function isDebugLevel(value: string): value is DebugLevel {
  return (LEVELS as readonly string[]).includes(value);
}

/**
 * Process-wide debug settings. Layers are merged in priority order
 * (defaults, environment, CLI, ephemeral) and subscribed loggers are
 * notified whenever the result changes.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings = {
    enabled: false,
    namespaces: [],
    level: 'debug',
    redactPatterns: ['apiKey', 'token', 'password'],
  };
  private envConfig: Partial<DebugSettings> | null = null;
  private cliConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings = { ...this.defaultConfig };
  private listeners: Set<() => void> = new Set();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager(process.env);
    }
    return ConfigurationManager.instance;
  }

  constructor(env: NodeJS.ProcessEnv = {}) {
    this.loadEnvironmentConfig(env);
    this.mergeConfigurations();
  }

  reloadEnvironment(env: NodeJS.ProcessEnv): void {
    this.loadEnvironmentConfig(env);
    this.mergeConfigurations();
  }

  // DEBUG only switches us on when it names one of our namespaces;
  // STEADYCHAT_DEBUG always does.
  private loadEnvironmentConfig(env: NodeJS.ProcessEnv): void {
    let config: Partial<DebugSettings> | null = null;

    if (env.DEBUG) {
      const namespaces = this.parseDebugEnv(env.DEBUG).filter(
        (ns) => ns.startsWith('steadychat') || ns === '*',
      );
      if (namespaces.length > 0) {
        config = { enabled: true, namespaces };
      }
    }

    if (env.STEADYCHAT_DEBUG) {
      config = {
        enabled: true,
        namespaces: this.parseDebugEnv(env.STEADYCHAT_DEBUG),
      };
    }

    if (env.DEBUG_LEVEL && isDebugLevel(env.DEBUG_LEVEL)) {
      config = { ...config, level: env.DEBUG_LEVEL };
    }

    this.envConfig = config;
  }

  private mergeConfigurations(): void {
    const layers = [this.envConfig, this.cliConfig, this.ephemeralConfig];
    let merged: DebugSettings = { ...this.defaultConfig };
    for (const layer of layers) {
      if (layer) {
        merged = { ...merged, ...layer };
      }
    }
    this.mergedConfig = merged;

    this.listeners.forEach((listener) => listener());
  }

  setCliConfig(config: Partial<DebugSettings>): void {
    this.cliConfig = config;
    this.mergeConfigurations();
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.mergeConfigurations();
  }

  clearEphemeralConfig(): void {
    this.ephemeralConfig = null;
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private parseDebugEnv(value: string): string[] {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
}
