import { v4 as uuidv4 } from 'uuid';
import { FastifyRequest, FastifyReply } from 'fastify';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Extract or generate correlation ID from request
 */
export function getCorrelationId(request: FastifyRequest): string {
  const headerValue = request.headers[CORRELATION_ID_HEADER];

  if (typeof headerValue === 'string' && headerValue.length > 0) {
    return headerValue;
  }

  if (Array.isArray(headerValue) && headerValue.length > 0) {
    return headerValue[0];
  }

  return generateCorrelationId();
}

/**
 * Add correlation ID to response headers
 */
export function setCorrelationId(reply: FastifyReply, correlationId: string): void {
  reply.header(CORRELATION_ID_HEADER, correlationId);
}

/**
 * Correlation ID already echoed on the reply, or a fresh one taken from the request
 */
export function ensureCorrelationId(request: FastifyRequest, reply: FastifyReply): string {
  const existing = reply.getHeader(CORRELATION_ID_HEADER);
  if (typeof existing === 'string') {
    return existing;
  }

  const correlationId = getCorrelationId(request);
  setCorrelationId(reply, correlationId);
  return correlationId;
}
