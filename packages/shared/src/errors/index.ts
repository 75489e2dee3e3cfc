/**
 * @cloudctl/shared - Error Classes
 * Structured error handling for the cloudctl client and dashboard
 */

export class CloudctlError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CloudctlError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CloudctlError);
    }
  }

  toJSON() {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

/** Invalid flags, theme names, tab names or config file contents. Fatal at startup. */
export class ConfigError extends CloudctlError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', 400, details);
    this.name = 'ConfigError';
  }
}

/** The terminal could not be switched to full-screen mode. */
export class TerminalInitError extends CloudctlError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TERMINAL_INIT_FAILED', 500, details);
    this.name = 'TerminalInitError';
  }
}

/**
 * Non-2xx answer from the cloud API, or a transport failure (statusCode 0).
 * `body` keeps the decoded response payload when there was one.
 */
export class ApiError extends CloudctlError {
  public readonly body?: unknown;

  constructor(message: string, statusCode: number, body?: unknown, details?: Record<string, unknown>) {
    super(message, 'FETCH_FAILED', statusCode, details);
    this.name = 'ApiError';
    this.body = body;
  }

  get isForbidden(): boolean {
    return this.statusCode === 403;
  }
}

export class FetchTimeoutError extends CloudctlError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation}: request timed out after ${timeoutMs}ms`, 'FETCH_TIMEOUT', 504, {
      operation,
      timeoutMs,
    });
    this.name = 'FetchTimeoutError';
  }
}

export function isForbidden(error: unknown): boolean {
  return error instanceof ApiError && error.isForbidden;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
