/**
 * Console Logger implementation
 * Pretty or JSON-lines output of structured log events
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

const BASIC_EVENT_TYPES: readonly LogEventType[] = ['debug', 'info', 'warn', 'error'];

/**
 * Console-based logger implementation.
 * All output goes to stderr so that event output on stdout stays clean.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.options = {
      includeTimestamp: true,
      jsonOutput: false,
      ...options,
    };
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

  private log(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message,
      metadata: { ...metadata },
    };

    this.output(event);
  }

  private output(event: LogEvent): void {
    if (this.options.jsonOutput) {
      console.error(JSON.stringify(event));
      return;
    }
    console.error(this.formatPretty(event));
  }

  private formatPretty(event: LogEvent): string {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      const time = new Date(event.timestamp).toLocaleTimeString();
      parts.push(`[${time}]`);
    }

    parts.push(this.getLevelIndicator(event.level));

    if (!BASIC_EVENT_TYPES.includes(event.eventType)) {
      parts.push(`(${event.eventType})`);
    }

    parts.push(event.message);

    const { sequenceUid, file, rule } = event.metadata;
    const metaParts: string[] = [];
    if (file) metaParts.push(`file=${file}`);
    if (rule) metaParts.push(`rule=${rule}`);
    if (typeof sequenceUid === 'string') metaParts.push(`seq=${sequenceUid.slice(0, 8)}`);

    if (metaParts.length > 0) {
      parts.push(`{${metaParts.join(', ')}}`);
    }

    return parts.join(' ');
  }

  private getLevelIndicator(level: LogLevel): string {
    switch (level) {
      case 'debug':
        return '🔍';
      case 'info':
        return 'ℹ️';
      case 'warn':
        return '⚠️';
      case 'error':
        return '❌';
      default:
        return '•';
    }
  }
}
