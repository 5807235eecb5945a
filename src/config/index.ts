import { AppConfig } from '../types';
import { ConfigurationError } from '../errors';
import { parseLogLevel } from '../utils/logger';

export const DEFAULT_ERROR_TEMPLATE_PATH = 'assets/error-template.html';

function parseBoolean(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1';
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): AppConfig {
  return {
    port: parseInt(process.env.PORT || '8080', 10),
    host: process.env.HOST || '0.0.0.0',
    nodeEnv: process.env.NODE_ENV || 'development',
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
    errorTemplatePath: process.env.ERROR_TEMPLATE_PATH || DEFAULT_ERROR_TEMPLATE_PATH,
    // Off unless explicitly enabled
    displayExceptionDetails: parseBoolean(process.env.DISPLAY_EXCEPTION_DETAILS),
  };
}

/**
 * Reject configuration the server cannot start with
 */
export function validateConfig(config: AppConfig): void {
  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    throw new ConfigurationError(`PORT must be an integer between 1 and 65535, got ${config.port}`, {
      setting: 'port',
    });
  }

  if (config.nodeEnv === 'production' && config.displayExceptionDetails) {
    throw new ConfigurationError('DISPLAY_EXCEPTION_DETAILS must not be enabled in production', {
      setting: 'displayExceptionDetails',
    });
  }
}
