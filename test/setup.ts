/**
 * Test Setup
 *
 * Silences the console log handler for every test. Tests that assert on
 * log output attach their own handler (see utils/logger-mock.ts).
 */

process.env['NODE_ENV'] = 'test';
process.env['LOG_LEVEL'] = 'debug';

import { afterEach, beforeEach, vi } from 'vitest';

import { clearLogHandlers, resetLogHandlers } from '../packages/kernel/logger';

beforeEach(() => {
  clearLogHandlers();
});

afterEach(() => {
  resetLogHandlers();
  vi.useRealTimers();
  vi.restoreAllMocks();
});
