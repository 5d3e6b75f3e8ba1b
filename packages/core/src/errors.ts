/**
 * Error taxonomy for the export pipeline.
 *
 * Each error carries a stable `code` and whether a retry may succeed.
 * Item-scoped errors (timestamps, rendering) skip one item; capture errors
 * abort one repository; fetch errors end up in the missing-attachments journal.
 */
export class ExportError extends Error {
  public readonly code: string;
  public readonly isRetryable: boolean;

  constructor(message: string, code: string, options: { isRetryable?: boolean; cause?: unknown } = {}) {
    super(message);
    this.name = 'ExportError';
    this.code = code;
    this.isRetryable = options.isRetryable ?? false;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class MalformedCaptureError extends ExportError {
  public readonly filePath: string;

  constructor(filePath: string, reason: string, cause?: unknown) {
    super(`Malformed capture file ${filePath}: ${reason}`, 'MALFORMED_CAPTURE', { cause });
    this.name = 'MalformedCaptureError';
    this.filePath = filePath;
  }
}

export class InvalidTimestampError extends ExportError {
  public readonly value: unknown;

  constructor(value: unknown, context: string) {
    super(`Invalid timestamp ${JSON.stringify(value ?? null)} in ${context}`, 'INVALID_TIMESTAMP');
    this.name = 'InvalidTimestampError';
    this.value = value;
  }
}

export class RenderError extends ExportError {
  public readonly field: string;

  constructor(field: string, context: string) {
    super(`Cannot render ${context}: missing required field "${field}"`, 'RENDER_ERROR');
    this.name = 'RenderError';
    this.field = field;
  }
}

export class FetchTransientError extends ExportError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, cause?: unknown) {
    super(message, 'FETCH_TRANSIENT', { isRetryable: true, cause });
    this.name = 'FetchTransientError';
    this.statusCode = statusCode;
  }
}

export class FetchPermanentError extends ExportError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, cause?: unknown) {
    super(message, 'FETCH_PERMANENT', { cause });
    this.name = 'FetchPermanentError';
    this.statusCode = statusCode;
  }
}

/** The session answered with a page instead of the file: the saved login has expired. */
export class LoginRequiredError extends FetchPermanentError {
  constructor(url: string) {
    super(`${url} returned an HTML page; run \`issuevault login\` to refresh the session`);
    this.name = 'LoginRequiredError';
  }
}

export class SessionUnavailableError extends ExportError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SESSION_UNAVAILABLE', { cause });
    this.name = 'SessionUnavailableError';
  }
}

export class ConfigError extends ExportError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * Whether an error is worth retrying. Unknown errors are retried only when
 * their message looks like a network failure.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ExportError) {
    return error.isRetryable;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('network') ||
      message.includes('timeout') ||
      message.includes('econnreset') ||
      message.includes('enotfound') ||
      message.includes('etimedout')
    );
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
