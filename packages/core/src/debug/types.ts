/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type DebugLevel = 'debug' | 'log' | 'warn' | 'error';

export interface DebugSettings {
  enabled: boolean;
  namespaces: string[];
  level: DebugLevel;
  redactPatterns: string[];
}
