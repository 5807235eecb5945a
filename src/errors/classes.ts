import { ErrorCode } from './codes';
import { ErrorMetadata } from './types';
import { HttpError } from './base';

// =============================================================================
// Request Errors (4xx)
// =============================================================================

/**
 * Request validation failed
 */
export class ValidationError extends HttpError {
  readonly code = ErrorCode.VALIDATION_ERROR;
  readonly statusCode = 400;

  constructor(message: string, metadata: ErrorMetadata = {}) {
    super(message, metadata);
  }
}

// =============================================================================
// Template Errors (500)
// =============================================================================

/**
 * Error page template could not be read
 */
export class TemplateLoadError extends HttpError {
  readonly code = ErrorCode.TEMPLATE_LOAD_FAILED;
  readonly statusCode = 500;

  constructor(templatePath: string, reason: string, metadata: ErrorMetadata = {}) {
    super(`Failed to load error template ${templatePath}: ${reason}`, { ...metadata, templatePath });
  }
}

// =============================================================================
// Configuration Errors (500)
// =============================================================================

/**
 * Configuration value is present but unusable
 */
export class ConfigurationError extends HttpError {
  readonly code = ErrorCode.CONFIGURATION_ERROR;
  readonly statusCode = 500;

  constructor(message: string, metadata: ErrorMetadata = {}) {
    super(`Configuration error: ${message}`, metadata);
  }
}

/**
 * Missing required configuration
 */
export class MissingConfigurationError extends HttpError {
  readonly code = ErrorCode.MISSING_CONFIGURATION;
  readonly statusCode = 500;

  constructor(setting: string, metadata: ErrorMetadata = {}) {
    super(`Missing required configuration: ${setting}`, { ...metadata, setting });
  }
}
