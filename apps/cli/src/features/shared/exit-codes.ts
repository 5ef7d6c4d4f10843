/**
 * Exit codes for the CLI.
 * HTTP failures are reported as data and still exit with SUCCESS.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** Validation error or unexpected failure */
  GENERAL_ERROR: 1,

  /** Interrupted by the user (SIGINT, 128 + 2) */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Exit the process with a specific exit code.
 * Use this instead of process.exit() for better tracking.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
