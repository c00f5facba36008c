/**
 * Logging module - structured logging implementations
 */

export { ConsoleLogger } from './console-logger';
export { BufferLogger, createBufferLogger } from './buffer-logger';
export { getDefaultLogger, setDefaultLogger, resetDefaultLogger } from './default-logger';
