import { vi } from 'vitest';
import type { Logger } from '../../src/utils/logger.js';

/**
 * Logger whose methods are spies; child() returns the same instance
 */
export function createMockLogger() {
  const log = {
    debug: vi.fn((_message: string, _meta?: Record<string, unknown>) => {}),
    info: vi.fn((_message: string, _meta?: Record<string, unknown>) => {}),
    warn: vi.fn((_message: string, _meta?: Record<string, unknown>) => {}),
    error: vi.fn((_message: string, _meta?: Record<string, unknown>) => {}),
    child: (_options: { component: string }): Logger => log,
  };
  return log;
}

export type MockLogger = ReturnType<typeof createMockLogger>;
