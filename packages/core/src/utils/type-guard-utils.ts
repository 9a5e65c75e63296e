import { err, type Result } from 'neverthrow';

export function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * True when `error` carries a string `code` equal to `code`, the way Node
 * reports filesystem failures (`ENOENT`, `EACCES`).
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return isObject(error) && error['code'] === code;
}

export function getErrorMessage(error: unknown, defaultMessage?: string): string {
  if (error instanceof Error) {
    return error.message;
  }
  return defaultMessage ?? String(error);
}

/**
 * Err result whose message is prefixed with `context`; the original error is
 * kept as `cause`.
 */
export function wrapError<T = never>(error: unknown, context: string): Result<T, Error> {
  return err(new Error(`${context}: ${getErrorMessage(error)}`, { cause: error }));
}
