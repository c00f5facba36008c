/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

import { FovConfig, OutputFormat } from '../types/effective-config';

/** Parsed CLI arguments */
export interface ParsedArgs {
  /** Path of the sequence file */
  input: string;

  /** Output format; unset means "use config" */
  format: OutputFormat | null;

  /** Field of view for grid plans */
  fov: FovConfig | null;

  /** Overrides the axis order stored in the file */
  axisOrder: string | null;

  /** Stop after this many events */
  limit: number | null;

  /** Disable interactive prompts */
  noInteractive: boolean;

  verbose: boolean;

  debug: boolean;

  /** Write log events as JSON lines on stderr */
  jsonLogs: boolean;

  help: boolean;

  version: boolean;
}

/** Default values for CLI arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  input: '',
  format: null,
  fov: null,
  axisOrder: null,
  limit: null,
  noInteractive: false,
  verbose: false,
  debug: false,
  jsonLogs: false,
  help: false,
  version: false,
};

export type ParseResult =
  | { success: true; args: ParsedArgs }
  | { success: false; error: string };
