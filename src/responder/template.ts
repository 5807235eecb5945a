import { readFileSync } from 'fs';
import { resolve } from 'path';
import { MissingConfigurationError, TemplateLoadError } from '../errors';
import { createLogger } from '../utils/logger';
import { ErrorTemplateCache, errorTemplateCache } from './cache';

const logger = createLogger('responder:template');

export const PLACEHOLDERS = ['title', 'errorCode', 'errorMessage', 'stackTrace'] as const;

export type Placeholder = (typeof PLACEHOLDERS)[number];

export type TemplateValues = Record<Placeholder, string>;

const PLACEHOLDER_PATTERN = /\{(title|errorCode|errorMessage|stackTrace)\}/g;

function isPlaceholder(name: string): name is Placeholder {
  return PLACEHOLDERS.some((placeholder) => placeholder === name);
}

/**
 * Error page template with `{title}`, `{errorCode}`, `{errorMessage}` and
 * `{stackTrace}` placeholders
 */
export class ErrorTemplate {
  constructor(
    readonly path: string,
    readonly text: string
  ) {}

  /**
   * Placeholders that do not occur in the template text
   */
  missingPlaceholders(): Placeholder[] {
    return PLACEHOLDERS.filter((name) => !this.text.includes(`{${name}}`));
  }

  /**
   * Substitute every placeholder in one pass. Values are inserted verbatim,
   * so a value containing `{title}` or `$&` is not expanded again.
   */
  fill(values: TemplateValues): string {
    return this.text.replace(PLACEHOLDER_PATTERN, (match: string, name: string) =>
      isPlaceholder(name) ? values[name] : match
    );
  }
}

/**
 * Read an error template from disk, once per resolved path
 *
 * Relative sources resolve against the working directory. The read is
 * synchronous and belongs at startup, never on a request path.
 *
 * @param source - Template file path
 * @throws MissingConfigurationError if source is empty
 * @throws TemplateLoadError if the file cannot be read
 */
export function loadErrorTemplate(
  source: string | undefined,
  cache: ErrorTemplateCache = errorTemplateCache
): ErrorTemplate {
  if (!source) {
    throw new MissingConfigurationError('errorTemplatePath');
  }

  const templatePath = resolve(process.cwd(), source);

  const cached = cache.get(templatePath);
  if (cached) {
    return cached;
  }

  let text: string;
  try {
    text = readFileSync(templatePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error({ templatePath, error: reason }, 'Failed to read error template');
    throw new TemplateLoadError(templatePath, reason);
  }

  const template = new ErrorTemplate(templatePath, text);

  const missing = template.missingPlaceholders();
  if (missing.length > 0) {
    logger.warn({ templatePath, missing }, 'Error template is missing placeholders');
  }

  cache.set(templatePath, template);
  logger.info({ templatePath, sizeBytes: Buffer.byteLength(text) }, 'Error template loaded');

  return template;
}
