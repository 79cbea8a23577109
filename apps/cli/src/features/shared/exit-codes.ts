/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all, including ledger invariant violations) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Input file not found */
  NOT_FOUND: 4,

  /** Input could not be parsed as a transaction CSV */
  VALIDATION_ERROR: 8,

  /** Configuration error (environment variables) */
  CONFIG_ERROR: 11,

  /** Permission denied reading input or writing the transaction log */
  PERMISSION_DENIED: 13,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
