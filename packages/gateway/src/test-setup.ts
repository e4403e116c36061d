/**
 * Global test setup for the gateway.
 *
 * Silences getLog for every test file. A test that asserts on log calls
 * declares its own `vi.mock` for the log module, which overrides this one.
 */

import { vi } from 'vitest';

vi.mock('./services/log.js', () => ({
  getLog: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  }),
}));
