import type { ErrorTemplateCacheEntry, ErrorTemplateCacheStats } from '../types';
import type { ErrorTemplate } from './template';
import { createLogger } from '../utils/logger';

const logger = createLogger('responder:cache');

/**
 * In-memory cache of loaded error templates, keyed by resolved file path
 *
 * Templates are read once at startup and never change afterwards, so
 * entries have no TTL and are never evicted.
 */
export class ErrorTemplateCache {
  private cache: Map<string, ErrorTemplateCacheEntry> = new Map();
  private stats: ErrorTemplateCacheStats = {
    hits: 0,
    misses: 0,
    entryCount: 0,
  };

  /**
   * @param templatePath - Resolved template path
   * @returns Template if cached, undefined otherwise
   */
  get(templatePath: string): ErrorTemplate | undefined {
    const entry = this.cache.get(templatePath);

    if (entry) {
      this.stats.hits++;
      logger.debug({ templatePath, hits: this.stats.hits }, 'Error template cache hit');
      return entry.template;
    }

    this.stats.misses++;
    logger.debug({ templatePath, misses: this.stats.misses }, 'Error template cache miss');
    return undefined;
  }

  set(templatePath: string, template: ErrorTemplate): void {
    if (!this.cache.has(templatePath)) {
      this.stats.entryCount++;
    }

    this.cache.set(templatePath, {
      templatePath,
      template,
      cachedAt: Date.now(),
    });
  }

  has(templatePath: string): boolean {
    return this.cache.has(templatePath);
  }

  getStats(): ErrorTemplateCacheStats {
    return { ...this.stats };
  }

  /**
   * Drop all entries and reset statistics
   */
  clear(): void {
    const count = this.cache.size;
    this.cache.clear();
    this.stats = {
      hits: 0,
      misses: 0,
      entryCount: 0,
    };

    logger.info({ clearedCount: count }, 'Error template cache cleared');
  }
}

// Singleton instance
export const errorTemplateCache = new ErrorTemplateCache();
