/**
 * EffectiveConfig type
 * Centralized configuration object for one CLI run
 */

/**
 * Output format for expanded events
 */
export type OutputFormat = 'summary' | 'table' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['summary', 'table', 'json'];

/**
 * Field of view used to convert grid overlap into physical steps
 */
export interface FovConfig {
  width: number;
  height: number;
}

export interface OutputConfig {
  format: OutputFormat;
  /** Maximum number of events to print (undefined = all) */
  limit?: number;
}

export interface VerbosityConfig {
  verbose: boolean;
  debug: boolean;
  /** Write log events as JSON lines */
  jsonLogs: boolean;
}

export interface InteractivityConfig {
  /** Whether prompts are allowed (still requires a TTY) */
  interactive: boolean;
}

/**
 * Source of a configuration value (for debugging/logging)
 */
export type ConfigSource = 'cli' | 'project' | 'user' | 'default';

/**
 * The complete effective configuration for a run
 */
export interface EffectiveConfig {
  schemaVersion: '1.0.0';

  /** Path of the sequence file to expand */
  input: string;

  /** Overrides the axis order stored in the file */
  axisOrder?: string;

  fov: FovConfig;

  output: OutputConfig;

  verbosity: VerbosityConfig;

  interactivity: InteractivityConfig;

  workingDirectory: string;

  /** Where each resolved value came from */
  sources?: Partial<Record<string, ConfigSource>>;
}

export const DEFAULT_CONFIG: Omit<EffectiveConfig, 'input' | 'workingDirectory'> = {
  schemaVersion: '1.0.0',
  fov: {
    width: 1,
    height: 1,
  },
  output: {
    format: 'summary',
  },
  verbosity: {
    verbose: false,
    debug: false,
    jsonLogs: false,
  },
  interactivity: {
    interactive: true,
  },
};

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}
