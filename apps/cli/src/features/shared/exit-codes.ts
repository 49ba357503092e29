/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Database error (connection, constraint, missing schema objects) */
  DATABASE_ERROR: 7,

  /** Validation error (currency filter, threshold, pack header) */
  VALIDATION_ERROR: 8,

  /** Operation cancelled by user */
  CANCELLED: 9,

  /** Configuration error */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Exit the process with a specific exit code.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
