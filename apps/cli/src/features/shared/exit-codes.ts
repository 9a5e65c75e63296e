/**
 * Process exit codes of the withdrawal-audit CLI. The JSON error envelope
 * carries the matching name in `error.code`.
 */
export const ExitCodes = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  /** Bad command arguments or options */
  INVALID_ARGS: 2,
  /** Measurement file missing */
  NOT_FOUND: 4,
  /** Measurement file unparseable or a record failed validation */
  VALIDATION_ERROR: 8,
  /** Config file missing, unreadable or invalid */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

type FailureExitCode = Exclude<ExitCode, typeof ExitCodes.SUCCESS>;

const ERROR_CODES: Record<FailureExitCode, string> = {
  [ExitCodes.GENERAL_ERROR]: 'GENERAL_ERROR',
  [ExitCodes.INVALID_ARGS]: 'INVALID_ARGS',
  [ExitCodes.NOT_FOUND]: 'NOT_FOUND',
  [ExitCodes.VALIDATION_ERROR]: 'VALIDATION_ERROR',
  [ExitCodes.CONFIG_ERROR]: 'CONFIG_ERROR',
};

export function exitCodeToErrorCode(exitCode: ExitCode): string {
  return exitCode === ExitCodes.SUCCESS ? 'UNKNOWN_ERROR' : ERROR_CODES[exitCode];
}
