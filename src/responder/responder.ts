import type pino from 'pino';
import { createLogger } from '../utils/logger';
import { ErrorContext, ErrorResponse, UNSET_STATUS_CODE } from './context';
import { stackFrames } from './stack';
import { ErrorTemplateCache } from './cache';
import { ErrorTemplate, loadErrorTemplate } from './template';
import { ERROR_TITLE, FormatRenderer, RenderInput, createPlainTextRenderer, defaultRenderers } from './renderers';

export interface ErrorResponderOptions {
  /** Path of the HTML error template */
  templateSource: string | undefined;
  /** Expose failure messages and stack frames to clients. Keep off in production. */
  displayExceptionDetails?: boolean;
  /** Extra renderers, tried before the built-in HTML, JSON and plain text ones */
  formats?: readonly FormatRenderer[];
  logger?: pino.BaseLogger;
  templateCache?: ErrorTemplateCache;
}

const DEFAULT_STATUS_CODE = 500;

/**
 * Status-line text may not span lines
 */
export function sanitizeStatusMessage(message: string): string {
  return message.replace(/[\r\n]/g, ' ');
}

function resolveStatusCode(statusCode: number): number {
  if (statusCode === UNSET_STATUS_CODE || !Number.isInteger(statusCode) || statusCode < 100 || statusCode > 599) {
    return DEFAULT_STATUS_CODE;
  }
  return statusCode;
}

/**
 * Writes an error body in the representation the response, route or client
 * asks for.
 *
 * Resolution order, first match wins:
 * 1. `Content-Type` already set on the response
 * 2. otherwise the content type the route produces
 * 3. each `Accept` entry in client preference order
 * 4. plain text
 *
 * The route's type outranks the client's `Accept` list even when both would
 * match.
 */
export class NegotiatedErrorResponder {
  readonly template: ErrorTemplate;
  readonly displayExceptionDetails: boolean;
  private readonly renderers: readonly FormatRenderer[];
  private readonly fallback: FormatRenderer;
  private readonly logger: pino.BaseLogger;

  /**
   * @throws MissingConfigurationError if templateSource is empty
   * @throws TemplateLoadError if the template cannot be read
   */
  constructor(options: ErrorResponderOptions) {
    this.template = loadErrorTemplate(options.templateSource, options.templateCache);
    this.displayExceptionDetails = options.displayExceptionDetails ?? false;
    this.logger = options.logger ?? createLogger('responder');
    this.fallback = createPlainTextRenderer();
    this.renderers = Object.freeze([...(options.formats ?? []), ...defaultRenderers(this.template)]);
  }

  /**
   * Names of the registered renderers, in the order they are tried
   */
  get formats(): string[] {
    return this.renderers.map((renderer) => renderer.name);
  }

  handle(context: ErrorContext): void {
    const { response, failure } = context;

    if (response.headersSent()) {
      // Part of the response is already on the wire; an error body would corrupt it
      this.logger.error({ err: failure }, 'Unexpected error on route');
      try {
        response.close();
      } catch (error) {
        this.logger.debug({ err: error }, 'Failed to close connection after partial response');
      }
      return;
    }

    const statusCode = resolveStatusCode(context.statusCode);
    response.setStatusCode(statusCode);
    let message = response.getStatusMessage();

    if (this.displayExceptionDetails && failure?.message) {
      message = sanitizeStatusMessage(failure.message);
      response.setStatusMessage(message);
    }

    const input: RenderInput = {
      title: ERROR_TITLE,
      statusCode,
      message,
      stack: this.displayExceptionDetails && failure ? stackFrames(failure) : undefined,
    };

    if (!this.sendDeclaredType(context, input) && !this.sendAcceptedType(context, input)) {
      this.send(response, this.fallback, input);
    }
  }

  private sendDeclaredType(context: ErrorContext, input: RenderInput): boolean {
    const mime = context.response.getHeader('content-type') ?? context.acceptableContentType;
    return mime !== undefined && this.trySend(context.response, mime, input);
  }

  private sendAcceptedType(context: ErrorContext, input: RenderInput): boolean {
    return context.acceptedTypes.some((mime) => this.trySend(context.response, mime, input));
  }

  private trySend(response: ErrorResponse, mime: string, input: RenderInput): boolean {
    const renderer = this.renderers.find((candidate) => candidate.matches(mime));
    if (!renderer) {
      return false;
    }
    this.send(response, renderer, input);
    return true;
  }

  private send(response: ErrorResponse, renderer: FormatRenderer, input: RenderInput): void {
    const { contentType, body } = renderer.render(input);
    response.setHeader('content-type', contentType);
    response.end(body);
  }
}
