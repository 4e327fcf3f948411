import { vi } from 'vitest';

export function createMockLogger() {
  const logger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    verbose: vi.fn(),
    log: vi.fn(),
    isErrorEnabled: vi.fn(() => true),
    isWarnEnabled: vi.fn(() => true),
    isInfoEnabled: vi.fn(() => true),
    isDebugEnabled: vi.fn(() => true),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export type MockLogger = ReturnType<typeof createMockLogger>;
