/**
 * Types module - shared interfaces and types
 * This module provides all injectable interfaces for testability
 */

// Axes
export type { AxisIndex } from './axis';
export { Axis, ALL_AXES, DEFAULT_AXIS_ORDER, isAxis, getAxisName, axisPrecedes } from './axis';

// Sequence errors and warnings
export type { ConfigurationRule, WarningRule, SequenceWarning } from './errors';
export { ConfigurationError, isConfigurationError } from './errors';

// Result type for typed error handling
export type { Result, Ok, Err } from './result';
export { ok, err } from './result';

// Exit codes
export { ExitCode, getExitCodeDescription, isSuccessExitCode } from './exit-codes';

// File system interface
export type { FileSystem, ReadOptions, FileSystemError, FileSystemErrorCode } from './file-system';
export { createFileSystemError } from './file-system';

// Prompter interface
export type { Prompter, ConfirmOptions, PrompterError, PrompterErrorCode } from './prompter';
export { createPrompterError } from './prompter';

// Logger interface
export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';
export { shouldLog, getEventLevel } from './logger';

// Effective config types
export type {
  EffectiveConfig,
  OutputFormat,
  FovConfig,
  OutputConfig,
  VerbosityConfig,
  InteractivityConfig,
  ConfigSource,
} from './effective-config';
export { DEFAULT_CONFIG, OUTPUT_FORMATS, isOutputFormat } from './effective-config';
