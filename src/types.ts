// Common TypeScript interfaces and types

import type { ErrorTemplate } from './responder/template';
import type { LogLevel } from './utils/logger';

export interface HealthStatus {
  status: 'ok';
}

export interface ReadinessStatus {
  ready: boolean;
  checks: {
    errorTemplate: boolean;
  };
}

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: LogLevel;
  /** HTML error page template, relative to the working directory */
  errorTemplatePath: string;
  /** Show failure messages and stack frames in error responses */
  displayExceptionDetails: boolean;
}

/**
 * Error template cache entry
 */
export interface ErrorTemplateCacheEntry {
  templatePath: string;
  template: ErrorTemplate;
  cachedAt: number;
}

/**
 * Error template cache statistics
 */
export interface ErrorTemplateCacheStats {
  hits: number;
  misses: number;
  entryCount: number;
}
