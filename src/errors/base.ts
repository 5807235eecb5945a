import { ErrorCode } from './codes';
import { ErrorMetadata, SerializedHttpError } from './types';

/**
 * Base class for errors raised by this service
 *
 * Carries the HTTP status the error responder should answer with, so a
 * thrown HttpError reaches the client as a negotiated error body with the
 * right status code.
 */
export abstract class HttpError extends Error {
  /** Structured error code for programmatic handling */
  abstract readonly code: ErrorCode;

  /** HTTP status code to return */
  abstract readonly statusCode: number;

  /** Additional metadata for debugging and logging */
  readonly metadata: ErrorMetadata;

  /** ISO 8601 timestamp when error occurred */
  readonly timestamp: string;

  constructor(message: string, metadata: ErrorMetadata = {}) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    this.timestamp = new Date().toISOString();

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Log form; the stack is left out */
  toJSON(): SerializedHttpError {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      timestamp: this.timestamp,
      metadata: Object.keys(this.metadata).length > 0 ? this.metadata : undefined,
    };
  }
}
