/**
 * Vitest Global Test Setup
 * @module tests/setup
 *
 * Test environment variables and shared hooks.
 */

import { afterEach, vi } from 'vitest';

// ============================================================================
// Environment Setup
// ============================================================================

// Set before any module creates its logger
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOG_PRETTY = 'false';

// ============================================================================
// Global Hooks
// ============================================================================

afterEach(() => {
  vi.clearAllMocks();
});
