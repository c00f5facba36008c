/**
 * Logger interface
 * Structured logging with event types and metadata
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for the sequence lifecycle
 */
export type LogEventType =
  // Sequence lifecycle
  | 'sequence_created'
  | 'sequence_warning'
  // Expansion
  | 'expansion_started'
  | 'expansion_completed'
  // Configuration and input
  | 'config_resolved'
  | 'input_loaded'
  | 'input_validation_failed'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Base metadata included in all log events
 */
export interface LogMetadata {
  /** uid of the sequence the event concerns */
  sequenceUid?: string;
  /** Path of the sequence file being processed */
  file?: string;
  /** Rule name for warnings and validation failures */
  rule?: string;
  /** Additional context-specific metadata */
  [key: string]: unknown;
}

export interface LogEvent {
  /** Timestamp of the event (ISO 8601) */
  timestamp: string;
  level: LogLevel;
  /** Event type for structured queries */
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Whether to write JSON lines instead of pretty output */
  jsonOutput?: boolean;
}

/**
 * Interface for structured logging
 * Implementations can write to the console or to a buffer (for testing)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;

  info(message: string, metadata?: LogMetadata): void;

  warn(message: string, metadata?: LogMetadata): void;

  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event; the level is derived from the event type
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

/**
 * Level at which a structured event is emitted
 */
export function getEventLevel(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'input_validation_failed':
      return 'error';
    case 'warn':
    case 'sequence_warning':
      return 'warn';
    case 'debug':
    case 'sequence_created':
      return 'debug';
    default:
      return 'info';
  }
}
