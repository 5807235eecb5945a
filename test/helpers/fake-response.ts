import { STATUS_CODES } from 'http';
import { ErrorResponse } from '../../src/responder';

interface FakeResponseOptions {
  headersSent?: boolean;
  closeThrows?: boolean;
  headers?: Record<string, string>;
}

/**
 * In-memory ErrorResponse recording everything the responder does to it
 */
export class FakeErrorResponse implements ErrorResponse {
  statusCode = 200;
  statusMessage: string | undefined;
  body: string | undefined;
  endCount = 0;
  closed = false;
  readonly headers = new Map<string, string>();
  private readonly sent: boolean;
  private readonly closeThrows: boolean;

  constructor(options: FakeResponseOptions = {}) {
    this.sent = options.headersSent ?? false;
    this.closeThrows = options.closeThrows ?? false;
    for (const [name, value] of Object.entries(options.headers ?? {})) {
      this.headers.set(name.toLowerCase(), value);
    }
  }

  headersSent(): boolean {
    return this.sent;
  }

  setStatusCode(statusCode: number): void {
    this.statusCode = statusCode;
  }

  getStatusMessage(): string {
    return STATUS_CODES[this.statusCode] ?? 'Unknown Status';
  }

  setStatusMessage(message: string): void {
    this.statusMessage = message;
  }

  getHeader(name: string): string | undefined {
    return this.headers.get(name.toLowerCase());
  }

  setHeader(name: string, value: string): void {
    this.headers.set(name.toLowerCase(), value);
  }

  end(body: string): void {
    this.body = body;
    this.endCount++;
  }

  close(): void {
    this.closed = true;
    if (this.closeThrows) {
      throw new Error('socket already destroyed');
    }
  }
}
