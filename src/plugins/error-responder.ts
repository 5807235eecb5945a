import { FastifyInstance, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import fastifyAccepts from '@fastify/accepts';
import { FormatRenderer, NegotiatedErrorResponder } from '../responder';
import { createErrorHandler, createFastifyErrorContext, createNotFoundHandler } from '../errors/handler';
import { ensureCorrelationId } from '../utils/correlation-id';

/**
 * Fastify plugin answering every failed request with a content-negotiated
 * error body
 */

declare module 'fastify' {
  interface FastifyInstance {
    errorResponder: NegotiatedErrorResponder;
  }

  interface FastifyReply {
    /**
     * Answer with a negotiated error body from inside a route. Unlike a thrown
     * error, a Content-Type already set on the reply is kept and wins the
     * negotiation.
     */
    sendError(error?: unknown, statusCode?: number): FastifyReply;
  }
}

export interface ErrorResponderPluginOptions {
  /** Path of the HTML error template */
  templateSource: string | undefined;
  displayExceptionDetails?: boolean;
  /** Extra renderers, tried before HTML, JSON and plain text */
  formats?: readonly FormatRenderer[];
}

async function errorResponderPlugin(
  fastify: FastifyInstance,
  options: ErrorResponderPluginOptions
): Promise<void> {
  const responder = new NegotiatedErrorResponder({
    templateSource: options.templateSource,
    displayExceptionDetails: options.displayExceptionDetails,
    formats: options.formats,
    logger: fastify.log,
  });

  if (responder.displayExceptionDetails) {
    fastify.log.warn('Error responses include failure messages and stack traces');
  }

  await fastify.register(fastifyAccepts);

  fastify.decorate('errorResponder', responder);

  fastify.decorateReply('sendError', function (this: FastifyReply, error?: unknown, statusCode?: number) {
    ensureCorrelationId(this.request, this);
    responder.handle(createFastifyErrorContext(this.request, this, error, statusCode));
    return this;
  });

  fastify.setErrorHandler(createErrorHandler(responder));
  fastify.setNotFoundHandler(createNotFoundHandler(responder));

  fastify.log.info({ formats: responder.formats }, 'Error responder registered');
}

export default fp(errorResponderPlugin, {
  name: 'error-responder',
  fastify: '4.x',
});
