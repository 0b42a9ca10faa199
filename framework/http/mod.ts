/**
 * HTTP Layer
 *
 * Request, responder and header-map abstractions consumed by the middleware.
 * The transport that produces them lives outside this package.
 */

export { WebRequest, defaultErrorHandler, type WebRequestInit } from './request.ts';
export { FilteredResponder, MemoryResponder, filterRespond } from './responder.ts';
export { StringsMap, canonicalHeaderKey, type KeyNormalizer, type StringsMapInit } from './strings_map.ts';
export { RequestError, XSRFEntropyError, type RequestErrorCode } from './errors.ts';
export { handlerFunc } from './types.ts';
export type {
  Handler,
  Middleware,
  ErrorHandler,
  Responder,
  ResponseBody,
  ResponseFilter,
} from './types.ts';
