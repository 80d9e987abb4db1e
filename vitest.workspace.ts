/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['packages/core', 'packages/cli']);
