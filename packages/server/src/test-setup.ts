/**
 * Global Test Setup. Runs before every test file in the server package.
 *
 * Silences getLog for all tests. A test that asserts on log calls declares
 * its own `vi.mock('./services/log.js')`, which overrides this one.
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
