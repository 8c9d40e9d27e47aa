export type AppErrorCode =
  | 'VALIDATION_ERROR'
  | 'ENCODING_ERROR'
  | 'NETWORK_ERROR'
  | 'DECODING_ERROR'
  | 'IO_ERROR';

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly details?: unknown;

  constructor(code: AppErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, details);
  }
}

export class EncodingError extends AppError {
  constructor(message: string, details?: unknown) {
    super('ENCODING_ERROR', message, details);
  }
}

export class NetworkError extends AppError {
  constructor(message: string, details?: unknown) {
    super('NETWORK_ERROR', message, details);
  }
}

/**
 * Response body could not be parsed or did not match the operation's shape.
 * `rawBody` holds the body exactly as received.
 */
export class DecodingError extends AppError {
  public readonly rawBody: string;
  public readonly cause: unknown;

  constructor(message: string, rawBody: string, cause: unknown) {
    super('DECODING_ERROR', message, describeCause(cause));
    this.rawBody = rawBody;
    this.cause = cause;
  }
}

export class IOError extends AppError {
  public readonly path: string;

  constructor(message: string, path: string, cause: unknown) {
    super('IO_ERROR', message, describeCause(cause));
    this.path = path;
  }
}

export function describeCause(error: unknown): Record<string, unknown> {
  return error instanceof Error
    ? { name: error.name, message: error.message }
    : { error };
}
