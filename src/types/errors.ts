/**
 * Sequence configuration errors and advisory warnings
 */

/**
 * Rules whose violation aborts sequence construction
 */
export type ConfigurationRule =
  | 'invalid_input'
  | 'invalid_axis_order'
  | 'z_plan_ownership'
  | 'nested_positions'
  | 'autofocus_requires_relative_z';

/**
 * Rules that only produce a warning
 */
export type WarningRule = 'channel_stride_order' | 'global_grid_override';

/**
 * A suspicious but legal configuration, surfaced to the caller
 */
export interface SequenceWarning {
  rule: WarningRule;
  message: string;
}

/**
 * Thrown when a sequence (or one of its positions) cannot be constructed.
 * Never thrown while iterating events.
 */
export class ConfigurationError extends Error {
  readonly rule: ConfigurationRule;
  /** Individual `path: message` problems, for schema failures */
  readonly issues: readonly string[];

  constructor(rule: ConfigurationRule, message: string, issues: readonly string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.rule = rule;
    this.issues = issues;
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
