/**
 * Default logger instance
 * Used by sequences constructed without an explicit logger
 */

import { Logger } from '../types/logger';
import { ConsoleLogger } from './console-logger';

function createFallbackLogger(): Logger {
  // Library callers only hear about warnings unless they inject their own logger
  return new ConsoleLogger({ minLevel: 'warn', includeTimestamp: false });
}

let defaultLogger: Logger = createFallbackLogger();

export function getDefaultLogger(): Logger {
  return defaultLogger;
}

/**
 * Set the default logger instance (the CLI and tests use this)
 */
export function setDefaultLogger(logger: Logger): void {
  defaultLogger = logger;
}

export function resetDefaultLogger(): void {
  defaultLogger = createFallbackLogger();
}
