/**
 * HTTP Errors
 */

export type RequestErrorCode =
  | 'ENTITY_TOO_LARGE'
  | 'EXPECTATION_FAILED'
  | 'MALFORMED_FORM'
  | 'BAD_XSRF_TOKEN';

/**
 * Client error reported through the request's error handler
 */
export class RequestError extends Error {
  readonly code: RequestErrorCode;

  constructor(code: RequestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RequestError';
    this.code = code;
  }
}

/**
 * The secure random source could not supply token bytes.
 * Never caught by the pipeline; the request aborts.
 */
export class XSRFEntropyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'XSRFEntropyError';
  }
}
