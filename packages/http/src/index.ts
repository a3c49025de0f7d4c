export {
  badRequest,
  headerFieldsTooLarge,
  HttpError,
  httpErrorResponse,
  httpVersionNotSupported,
  internalServerError,
  isHttpError,
  notFound,
  notImplemented,
  payloadTooLarge,
  type HttpErrorStatus
} from './errors';
export {createExtensionKey, Extensions, type ExtensionKey} from './extensions';
export {bodyBytes, requestVersion} from './extractors';
export {finalizeResponse} from './finalize';
export {
  createHandler,
  extractorFailed,
  noRouteMatched,
  resolveDispatchOutcome,
  routed,
  type Dispatch,
  type DispatchOutcome,
  type Extracted,
  type ExtractResult,
  type Extractor,
  type RequestContext,
  type RouteHandler
} from './handler';
export {
  appendHeader,
  getHeader,
  getHeaderValues,
  normalizeHeaderName,
  validateHeaderValue,
  type Header,
  type HeaderList
} from './headers';
export {httpVersions, isHttpVersion, type HttpRequest, type HttpVersion} from './request';
export {
  BINARY_CONTENT_TYPE,
  bytesResponse,
  createResponse,
  intoResponse,
  notFoundResponse,
  textResponse,
  TEXT_CONTENT_TYPE,
  type HttpResponse,
  type IntoResponse,
  type Responder
} from './response';
export {err, ok, type Failure, type Result, type Success} from './result';
