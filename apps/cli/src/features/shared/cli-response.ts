/**
 * JSON envelope printed by every command in --json mode.
 */
export type CLIResponse<T> = CLISuccessResponse<T> | CLIErrorResponse;

interface CLIResponseBase {
  command: string;
  /** ISO 8601 time the response was built */
  timestamp: string;
  metadata?: CLIResponseMetadata | undefined;
}

export interface CLISuccessResponse<T> extends CLIResponseBase {
  success: true;
  data: T;
}

export interface CLIErrorResponse extends CLIResponseBase {
  success: false;
  error: {
    /** Upper-case exit code name, e.g. VALIDATION_ERROR */
    code: string;
    message: string;
    /** Only when NODE_ENV=development */
    stack?: string | undefined;
  };
}

export interface CLIResponseMetadata {
  [key: string]: unknown;
  duration_ms?: number | undefined;
}

export function createSuccessResponse<T>(
  command: string,
  data: T,
  metadata?: CLIResponseMetadata
): CLISuccessResponse<T> {
  return {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
    ...(metadata && { metadata }),
  };
}

export function createErrorResponse(command: string, error: Error, code: string): CLIErrorResponse {
  const includeStack = process.env['NODE_ENV'] === 'development' && error.stack !== undefined;

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: {
      code,
      message: error.message,
      ...(includeStack && { stack: error.stack }),
    },
  };
}
