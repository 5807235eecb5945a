export { UNSET_STATUS_CODE } from './context';
export type { ErrorContext, ErrorResponse, FailureCause } from './context';
export { NegotiatedErrorResponder, sanitizeStatusMessage } from './responder';
export type { ErrorResponderOptions } from './responder';
export {
  ERROR_TITLE,
  createHtmlRenderer,
  createJsonRenderer,
  createPlainTextRenderer,
  defaultRenderers,
  escapeHtml,
  prefixMatcher,
} from './renderers';
export type { FormatRenderer, RenderInput, RenderedError } from './renderers';
export { ErrorTemplate, PLACEHOLDERS, loadErrorTemplate } from './template';
export type { Placeholder, TemplateValues } from './template';
export { ErrorTemplateCache, errorTemplateCache } from './cache';
export { stackFrames } from './stack';
