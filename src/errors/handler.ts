import { STATUS_CODES } from 'http';
import { FastifyReply, FastifyRequest } from 'fastify';
import { HttpError } from './base';
import { ErrorContext, ErrorResponse, FailureCause, NegotiatedErrorResponder, UNSET_STATUS_CODE } from '../responder';
import { ensureCorrelationId } from '../utils/correlation-id';

declare module 'fastify' {
  interface FastifyContextConfig {
    /** Content type the route responds with; error responses use it ahead of the Accept header */
    produces?: string;
  }
}

// Characters Node accepts in a status line (see http.ServerResponse#writeHead)
const STATUS_LINE_SAFE = /^[\t\x20-\x7e\x80-\xff]*$/;

function isValidStatusCode(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 100 && value <= 599;
}

/**
 * Status code carried by a thrown value, or UNSET_STATUS_CODE
 *
 * Reads HttpError#statusCode, then the `statusCode`/`status` properties set
 * by Fastify and http-errors style errors.
 */
export function resolveFailureStatus(error: unknown): number {
  if (error instanceof HttpError) {
    return error.statusCode;
  }

  if (typeof error === 'object' && error !== null) {
    if ('statusCode' in error && isValidStatusCode(error.statusCode)) {
      return error.statusCode;
    }
    if ('status' in error && isValidStatusCode(error.status)) {
      return error.status;
    }
  }

  return UNSET_STATUS_CODE;
}

function toFailureCause(error: unknown): FailureCause | undefined {
  if (error instanceof Error) {
    return error;
  }
  if (error === undefined || error === null) {
    return undefined;
  }
  return { message: String(error) };
}

/**
 * ErrorResponse over a Fastify reply
 */
export class FastifyErrorResponse implements ErrorResponse {
  constructor(private readonly reply: FastifyReply) {}

  headersSent(): boolean {
    return this.reply.raw.headersSent;
  }

  setStatusCode(statusCode: number): void {
    this.reply.code(statusCode);
  }

  getStatusMessage(): string {
    return STATUS_CODES[this.reply.statusCode] ?? 'Unknown Status';
  }

  /**
   * Text Node would reject in a status line is left out of it; the body still carries it
   */
  setStatusMessage(message: string): void {
    if (STATUS_LINE_SAFE.test(message)) {
      this.reply.raw.statusMessage = message;
    }
  }

  getHeader(name: string): string | undefined {
    const value = this.reply.getHeader(name);
    if (value === undefined) {
      return undefined;
    }
    return Array.isArray(value) ? value.join(', ') : String(value);
  }

  setHeader(name: string, value: string): void {
    this.reply.header(name, value);
  }

  end(body: string): void {
    this.reply.send(body);
  }

  close(): void {
    // Take the reply away from Fastify so it does not try to finish it
    this.reply.hijack();
    this.reply.raw.destroy();
  }
}

/**
 * Accept entries in preference order; `['*\/*']` when the header is absent
 */
export function acceptedTypes(request: FastifyRequest): string[] {
  const types = request.accepts().types();
  if (Array.isArray(types)) {
    return types;
  }
  return types ? [types] : [];
}

/**
 * Build the responder's view of a failed Fastify request
 *
 * @param statusCode - Overrides the status read from the error
 */
export function createFastifyErrorContext(
  request: FastifyRequest,
  reply: FastifyReply,
  error?: unknown,
  statusCode?: number
): ErrorContext {
  return {
    response: new FastifyErrorResponse(reply),
    statusCode: statusCode ?? resolveFailureStatus(error),
    failure: toFailureCause(error),
    acceptableContentType: request.routeOptions.config?.produces,
    acceptedTypes: acceptedTypes(request),
  };
}

function logFailure(request: FastifyRequest, correlationId: string, statusCode: number, error?: unknown): void {
  const entry = {
    correlationId,
    statusCode,
    method: request.method,
    url: request.url,
    // HttpErrors log their code and metadata; anything else goes through pino's err serializer
    ...(error instanceof HttpError ? { error: error.toJSON() } : { err: error }),
  };

  if (statusCode === UNSET_STATUS_CODE || statusCode >= 500) {
    request.log.error(entry, 'Request error');
  } else {
    request.log.warn(entry, 'Request error');
  }
}

/**
 * Create a Fastify error handler that answers through the responder
 *
 * This handler:
 * 1. Echoes the correlation ID
 * 2. Logs the failure with request details
 * 3. Hands the failure to the responder for a negotiated body
 */
export function createErrorHandler(responder: NegotiatedErrorResponder) {
  return (error: Error, request: FastifyRequest, reply: FastifyReply): void => {
    const correlationId = ensureCorrelationId(request, reply);
    const context = createFastifyErrorContext(request, reply, error);

    logFailure(request, correlationId, context.statusCode, error);
    responder.handle(context);
  };
}

/**
 * Create a Fastify not-found handler answering 404 through the responder
 */
export function createNotFoundHandler(responder: NegotiatedErrorResponder) {
  return (request: FastifyRequest, reply: FastifyReply): void => {
    ensureCorrelationId(request, reply);
    responder.handle(createFastifyErrorContext(request, reply, undefined, 404));
  };
}
