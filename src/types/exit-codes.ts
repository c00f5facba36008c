/**
 * Standardized exit codes for the mda-sequence CLI
 */

export const ExitCode = {
  /** Successful execution */
  SUCCESS: 0,
  /** Unexpected/unhandled error */
  UNEXPECTED_ERROR: 1,
  /** Invalid CLI usage or missing input file */
  USAGE_ERROR: 2,
  /** Sequence file unreadable, malformed or rejected by validation */
  VALIDATION_ERROR: 3,
  /** User declined to continue at a prompt */
  CANCELLED: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'Successful execution';
    case ExitCode.UNEXPECTED_ERROR:
      return 'Unexpected or unhandled error';
    case ExitCode.USAGE_ERROR:
      return 'Invalid CLI usage or missing input';
    case ExitCode.VALIDATION_ERROR:
      return 'Sequence file or sequence validation failed';
    case ExitCode.CANCELLED:
      return 'Cancelled by user';
    default:
      return 'Unknown exit code';
  }
}

export function isSuccessExitCode(code: number): boolean {
  return code === ExitCode.SUCCESS;
}
