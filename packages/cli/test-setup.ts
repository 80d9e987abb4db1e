/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, beforeAll } from 'vitest';
import { ConfigurationManager } from '@steadychat/core';

// Keep a developer's DEBUG settings out of assertions on stderr.
beforeAll(() => {
  ConfigurationManager.getInstance().reloadEnvironment({});
});

afterEach(() => {
  ConfigurationManager.getInstance().setCliConfig({});
  ConfigurationManager.getInstance().clearEphemeralConfig();
});
