import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Error carrying the exit code the command should terminate with.
 * Handlers return it inside a Result; the command layer maps it to output.
 */
export class CliCommandError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CliCommandError';
    this.exitCode = exitCode;
  }
}

/**
 * Exit code for any error reaching the command layer.
 */
export function exitCodeOf(error: Error): ExitCode {
  return error instanceof CliCommandError ? error.exitCode : ExitCodes.GENERAL_ERROR;
}
