/**
 * Middleware Layer
 *
 * Handler decorators that wrap every request: body limit and form parsing,
 * XSRF protection, error handler injection and debug logging.
 */

export { HandlerPipeline, compose } from './pipeline.ts';
export { formGate, parseForm, parseUrlEncoded, processForm, FORM_CONTENT_TYPE } from './form.ts';
export {
  xsrfGuard,
  generateXSRFToken,
  xsrfCookie,
  XSRF_COOKIE_NAME,
  XSRF_PARAM_NAME,
  type RandomSource,
  type XSRFOptions,
} from './xsrf.ts';
export { setErrorHandler } from './errors.ts';
export { debugLogger, formatRequest, formatResponse } from './logging.ts';
