/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, beforeAll } from 'vitest';
import { ConfigurationManager } from './src/debug/index.js';

// Debug output depends on the developer's shell; start every run disabled.
beforeAll(() => {
  ConfigurationManager.getInstance().reloadEnvironment({});
});

afterEach(() => {
  ConfigurationManager.getInstance().clearEphemeralConfig();
});
