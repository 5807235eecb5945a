/**
 * Structured error codes for programmatic error handling
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR
 *
 * Categories:
 * - VALIDATION_*  : Request validation errors
 * - TEMPLATE_*    : Error page template errors
 * - *CONFIGURATION : Configuration errors
 */
export enum ErrorCode {
  // Request errors (4xx)
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // Template errors (500)
  TEMPLATE_LOAD_FAILED = 'TEMPLATE_LOAD_FAILED',

  // Configuration errors (500)
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  MISSING_CONFIGURATION = 'MISSING_CONFIGURATION',
}
