/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach } from 'vitest';
import { DebugLogger } from './src/debug/DebugLogger.js';

// Loggers are cached per namespace; drop them so tests cannot observe each other's spies.
afterEach(() => {
  DebugLogger.resetForTesting();
});
