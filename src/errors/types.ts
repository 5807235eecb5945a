import { ErrorCode } from './codes';

/**
 * Metadata attached to errors for debugging and logging
 */
export interface ErrorMetadata {
  /** Resolved path of a template file */
  templatePath?: string;
  /** Name of a configuration setting */
  setting?: string;
  /** Allow additional metadata fields */
  [key: string]: unknown;
}

/**
 * JSON form of an HttpError, used in logs
 */
export interface SerializedHttpError {
  error: string;
  code: ErrorCode;
  message: string;
  statusCode: number;
  timestamp: string;
  metadata?: ErrorMetadata;
}
