import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { HealthStatus, ReadinessStatus } from '../types';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';

/**
 * Health check routes
 */
export async function healthRoutes(app: FastifyInstance): Promise<void> {
  /**
   * GET /healthz - Liveness probe
   * Always returns 200 if the service is running
   */
  app.get<{ Reply: HealthStatus }>('/healthz', async (request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);
    return reply.code(200).send({ status: 'ok' });
  });

  /**
   * GET /readyz - Readiness probe
   * Returns 200 once the error template is loaded, 503 otherwise
   */
  app.get<{ Reply: ReadinessStatus }>('/readyz', async (request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);

    const errorTemplate = app.hasDecorator('errorResponder') && app.errorResponder.template.text.length > 0;

    const status: ReadinessStatus = {
      ready: errorTemplate,
      checks: { errorTemplate },
    };

    return reply.code(status.ready ? 200 : 503).send(status);
  });
}
