/**
 * Status code value meaning "no status was recorded for this failure"
 */
export const UNSET_STATUS_CODE = -1;

/**
 * The in-flight response an error body is written to
 */
export interface ErrorResponse {
  /** Whether the status line and headers have already gone out */
  headersSent(): boolean;
  setStatusCode(statusCode: number): void;
  /** Default reason phrase for the current status code */
  getStatusMessage(): string;
  setStatusMessage(message: string): void;
  getHeader(name: string): string | undefined;
  setHeader(name: string, value: string): void;
  /** Write the body and finish the response */
  end(body: string): void;
  /** Tear down the underlying connection */
  close(): void;
}

/**
 * What caused a request to fail. Any `Error` satisfies it.
 */
export interface FailureCause {
  message?: string | null;
  stack?: string;
}

/**
 * Snapshot of a failed exchange, handed to the responder once per request
 */
export interface ErrorContext {
  readonly response: ErrorResponse;
  /** Recorded status, or UNSET_STATUS_CODE */
  readonly statusCode: number;
  readonly failure?: FailureCause;
  /** Content type the route declares it produces */
  readonly acceptableContentType?: string;
  /** Client `Accept` media types, most preferred first */
  readonly acceptedTypes: readonly string[];
}
