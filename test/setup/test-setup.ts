/**
 * Test Setup
 * Runs before each test file
 */

import { afterEach, vi } from 'vitest';

// Tests that freeze the clock must not leak it into the next test
afterEach(() => {
  vi.useRealTimers();
});
