export * from './responder';
export * from './errors';
export {
  FastifyErrorResponse,
  createErrorHandler,
  createFastifyErrorContext,
  createNotFoundHandler,
  resolveFailureStatus,
} from './errors/handler';
export { default as errorResponderPlugin } from './plugins/error-responder';
export type { ErrorResponderPluginOptions } from './plugins/error-responder';
export { build } from './server';
export { loadConfig, validateConfig } from './config';
export type { AppConfig } from './types';
