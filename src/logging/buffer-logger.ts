/**
 * Buffer Logger implementation
 * For testing - stores events in memory without output
 */

import {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
  shouldLog,
  getEventLevel,
} from '../types/logger';

export class BufferLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly events: LogEvent[] = [];

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'debug';
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(getEventLevel(eventType), eventType, message, metadata);
  }

  getEventsByLevel(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }

  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.events.filter((e) => e.eventType === eventType);
  }

  hasEventType(eventType: LogEventType): boolean {
    return this.events.some((e) => e.eventType === eventType);
  }

  private log(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    this.events.push({
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message,
      metadata: { ...metadata },
    });
  }
}

export function createBufferLogger(options?: LoggerOptions): BufferLogger {
  return new BufferLogger(options);
}
