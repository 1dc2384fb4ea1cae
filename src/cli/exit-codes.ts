/**
 * Exit codes returned by the runner
 *
 * @see Use these constants instead of magic numbers when mapping a run to a process exit
 */
export const EXIT_CODES = {
  /** Action completed, or help was requested */
  SUCCESS: 0,

  /** The action itself failed */
  ERROR: 1,

  /** Usage error (unknown option, missing or surplus values, stray argument) */
  USAGE_ERROR: 2,

  /** A value could not be decoded to its declared type */
  INVALID_VALUE: 3,
} as const;

/**
 * Type for exit codes
 */
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code metadata for documentation
 */
export const EXIT_CODE_METADATA = [
  {
    code: EXIT_CODES.SUCCESS,
    name: 'SUCCESS',
    description: 'Action completed successfully, or help was shown on request',
  },
  {
    code: EXIT_CODES.ERROR,
    name: 'ERROR',
    description: 'The command action threw or rejected',
  },
  {
    code: EXIT_CODES.USAGE_ERROR,
    name: 'USAGE_ERROR',
    description: 'The command line could not be parsed (help is printed with the diagnostics)',
  },
  {
    code: EXIT_CODES.INVALID_VALUE,
    name: 'INVALID_VALUE',
    description: 'A value read by the action did not decode to its declared type',
  },
] as const;
