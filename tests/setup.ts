/**
 * Runs before every test file: environment for config.ts, the Anthropic
 * stand-in, and mock cleanup between tests.
 */

import { beforeEach, vi } from 'vitest';

// Must be set before anything imports config.ts
Object.assign(process.env, {
  NODE_ENV: 'test',
  ANTHROPIC_API_KEY: 'test-api-key',
  INTENT_PROVIDER: 'keyword',
  PLANNER_BASE_URL: 'http://planner.test',
  SPECIALIST_BASE_URLS: 'http://flights.test,http://hotels.test,http://cars.test',
  APP_LOG_FILE: 'off',
});

import { clearMockState } from './mocks/anthropic.js';

beforeEach(() => {
  vi.clearAllMocks();
  clearMockState();
});
