import { ErrorCode } from './error-codes';

export interface ChirpyErrorOptions {
  code: ErrorCode;
  message: string;
  httpStatusCode: number;
  resource?: string;
  originalError?: Error;
  metadata?: Record<string, unknown>;
}

export interface ChirpyErrorBody {
  error: string;
  statusCode: number;
}

export class ChirpyError extends Error {
  readonly code: ErrorCode;
  readonly httpStatusCode: number;
  readonly resource?: string;
  readonly originalError?: Error;
  readonly metadata?: Record<string, unknown>;

  constructor(options: ChirpyErrorOptions) {
    super(options.message);
    this.name = 'ChirpyError';
    this.code = options.code;
    this.httpStatusCode = options.httpStatusCode;
    this.resource = options.resource;
    this.originalError = options.originalError;
    this.metadata = options.metadata;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Client-visible body. The code and original error stay server-side so
   * that auth failures do not reveal which check rejected them.
   */
  toJSON(): ChirpyErrorBody {
    return {
      error: this.message,
      statusCode: this.httpStatusCode,
    };
  }
}

/**
 * Normalise a caught value into an Error for logging and wrapping
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
