import { Logger, LogLevel } from '../../src/util/logger';

/**
 * Create a mock logger for testing
 * @returns Mock logger instance
 */
export class MockLogger implements Logger {
  log = jest.fn();
  info = jest.fn();
  error = jest.fn();
  debug = jest.fn();
  warn = jest.fn();
  api = jest.fn();
  pipeline = jest.fn();
  marker = jest.fn();
  setLogLevel = jest.fn();
  getLogLevel = jest.fn().mockReturnValue(LogLevel.INFO);
  enableCategory = jest.fn();
  disableCategory = jest.fn();
  isCategoryEnabled = jest.fn().mockReturnValue(true);
  formatValue = jest.fn((value: unknown) => typeof value === 'object' ? JSON.stringify(value) : String(value));
}

export function createMockLogger(): MockLogger {
  return new MockLogger();
}
