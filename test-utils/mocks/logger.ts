import { vi } from 'vitest';

/**
 * Creates a mock logger with all standard methods.
 * Use this instead of mocking the logger module in each test file.
 */
export const createMockLogger = () => ({
  trace: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

/**
 * Default mock logger instance
 */
export const mockLogger = createMockLogger();

/**
 * Module mock for logger
 * Usage: vi.mock('../../utils/logger', async () => (await import('../../test-utils/mocks/logger')).mockLoggerModule)
 */
export const mockLoggerModule = {
  logger: mockLogger,
  setLogLevel: vi.fn(),
};
