/**
 * Error classes and Fastify error handling
 *
 * ```typescript
 * import { ValidationError } from './errors';
 * import { createErrorHandler } from './errors/handler';
 *
 * // Thrown errors carry their status to the error responder
 * throw new ValidationError('name is required');
 *
 * app.setErrorHandler(createErrorHandler(responder));
 * ```
 */

// Error codes enum
export { ErrorCode } from './codes';

// Types and interfaces
export type { ErrorMetadata, SerializedHttpError } from './types';

// Base error class
export { HttpError } from './base';

export {
  // Request errors
  ValidationError,
  // Template errors
  TemplateLoadError,
  // Configuration errors
  ConfigurationError,
  MissingConfigurationError,
} from './classes';
