import { ErrorTemplate } from './template';

export const ERROR_TITLE = 'An unexpected error occurred';

export interface RenderInput {
  title: string;
  statusCode: number;
  message: string;
  /** Present only when failure details are exposed and a failure was recorded */
  stack?: readonly string[];
}

export interface RenderedError {
  contentType: string;
  body: string;
}

/**
 * Produces an error body for one MIME family
 */
export interface FormatRenderer {
  readonly name: string;
  matches(mime: string): boolean;
  render(input: RenderInput): RenderedError;
}

/**
 * Case-insensitive prefix test, so `text/html` matches `text/html; charset=utf-8`
 */
export function prefixMatcher(prefix: string): (mime: string) => boolean {
  const normalized = prefix.toLowerCase();
  return (mime) => mime.trim().toLowerCase().startsWith(normalized);
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
};

/**
 * Escape text placed inside an element; quotes stay as they are
 */
export function escapeHtml(value: string): string {
  return value.replace(/[&<>]/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function createHtmlRenderer(template: ErrorTemplate): FormatRenderer {
  return {
    name: 'html',
    matches: prefixMatcher('text/html'),
    render({ title, statusCode, message, stack }) {
      const items = (stack ?? []).map((frame) => `<li>${escapeHtml(frame)}</li>`).join('');
      return {
        contentType: 'text/html',
        body: template.fill({
          title,
          errorCode: String(statusCode),
          errorMessage: escapeHtml(message),
          stackTrace: items,
        }),
      };
    },
  };
}

interface JsonErrorBody {
  error: {
    code: number;
    message: string;
  };
  stack?: string[];
}

export function createJsonRenderer(): FormatRenderer {
  return {
    name: 'json',
    matches: prefixMatcher('application/json'),
    render({ statusCode, message, stack }) {
      const body: JsonErrorBody = { error: { code: statusCode, message } };
      if (stack) {
        body.stack = [...stack];
      }
      return { contentType: 'application/json', body: JSON.stringify(body) };
    },
  };
}

export function createPlainTextRenderer(): FormatRenderer {
  return {
    name: 'text',
    matches: prefixMatcher('text/plain'),
    render({ statusCode, message, stack }) {
      let body = `Error ${statusCode}: ${message}`;
      if (stack && stack.length > 0) {
        body += '\n' + stack.map((frame) => `\tat ${frame}\n`).join('');
      }
      return { contentType: 'text/plain', body };
    },
  };
}

/**
 * HTML, JSON and plain text, in that order
 */
export function defaultRenderers(template: ErrorTemplate): FormatRenderer[] {
  return [createHtmlRenderer(template), createJsonRenderer(), createPlainTextRenderer()];
}
