/**
 * Typed errors raised by the utility layer.
 *
 * Conversion failures never surface here: the charset layer logs them and
 * falls back to the original text.
 */

export class SourcecastError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Stream URL errors

export type UrlErrorReason =
  | 'NOT_HTTP'
  | 'MISSING_PORT'
  | 'MISSING_HOST'
  | 'MISSING_MOUNT'
  | 'PORT_INVALID';

export class InvalidUrlError extends SourcecastError {
  constructor(
    public readonly reason: UrlErrorReason,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super('INVALID_URL', `invalid <url>: ${message}`, { reason, ...details });
  }
}

// PID file errors

export class PidFileError extends SourcecastError {
  /** OS error code of the failing call, e.g. `EACCES` or `ELOCKED`. */
  public readonly code: string;

  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    const code = errorCodeOf(cause);
    super(
      'PID_FILE',
      `${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { path, code },
      { cause },
    );
    this.code = code;
  }
}

/** The `code` of a Node system error, or `UNKNOWN`. */
export function errorCodeOf(err: unknown): string {
  if (
    err instanceof Error &&
    'code' in err &&
    typeof err.code === 'string'
  ) {
    return err.code;
  }
  return 'UNKNOWN';
}
