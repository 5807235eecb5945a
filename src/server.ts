import dotenv from 'dotenv';
import Fastify, { FastifyInstance } from 'fastify';
import { healthRoutes } from './routes/health';
import errorResponderPlugin from './plugins/error-responder';
import { loadConfig, validateConfig } from './config';
import { AppConfig } from './types';

// Load environment variables from .env file
dotenv.config();

/**
 * Build and configure the Fastify application
 * @param overrides - Config values taking precedence over the environment
 * @returns Configured Fastify instance
 */
export async function build(overrides: Partial<AppConfig> = {}): Promise<FastifyInstance> {
  const config: AppConfig = { ...loadConfig(), ...overrides };
  validateConfig(config);

  const app = Fastify({
    logger: config.nodeEnv === 'test' ? false : { level: config.logLevel },
  });

  // Registered before routes so the error and not-found handlers cover them
  await app.register(errorResponderPlugin, {
    templateSource: config.errorTemplatePath,
    displayExceptionDetails: config.displayExceptionDetails,
  });

  await app.register(healthRoutes);

  return app;
}

/**
 * Start the server if this file is run directly
 */
if (require.main === module) {
  const config = loadConfig();

  build()
    .then(async (app) => {
      try {
        await app.listen({
          port: config.port,
          host: config.host,
        });

        app.log.info(`Environment: ${config.nodeEnv}`);
      } catch (err) {
        app.log.error(err);
        process.exit(1);
      }

      const shutdown = async (signal: string) => {
        app.log.info(`Received ${signal}, shutting down gracefully...`);
        await app.close();
        process.exit(0);
      };

      process.on('SIGTERM', () => void shutdown('SIGTERM'));
      process.on('SIGINT', () => void shutdown('SIGINT'));
    })
    .catch((err) => {
      console.error('Failed to build application:', err);
      process.exit(1);
    });
}
