/**
 * XSRF Middleware
 *
 * Cross-Site Request Forgery protection. A token is kept in an HttpOnly
 * cookie and must be echoed back in the `xsrf` form parameter.
 *
 * Safe methods with a missing or stale parameter are let through with the
 * parameter corrected, so the page they render carries a valid token.
 * Protected methods are answered with 404 rather than 403: a forged request
 * learns nothing about whether the resource exists.
 */

import { getRandomValues } from 'node:crypto';

import { RequestError, XSRFEntropyError } from '../http/errors.ts';
import { handlerFunc, type Handler } from '../http/types.ts';
import { addSpanEvent } from '../telemetry/otel.ts';

export const XSRF_COOKIE_NAME = 'xsrf';
export const XSRF_PARAM_NAME = 'xsrf';

const TOKEN_BYTES = 4;
const TOKEN_LENGTH = TOKEN_BYTES * 2;
const STATUS_NOT_FOUND = 404;

/**
 * Source of cryptographically secure bytes
 */
export type RandomSource = (size: number) => Uint8Array;

export interface XSRFOptions {
  /** Methods rejected on a token mismatch */
  protectedMethods?: string[];
  randomSource?: RandomSource;
}

const DEFAULT_OPTIONS: Required<XSRFOptions> = {
  protectedMethods: ['POST', 'PUT'],
  randomSource: (size) => getRandomValues(new Uint8Array(size)),
};

/**
 * Generate an 8 character hex token
 */
export function generateXSRFToken(randomSource: RandomSource = DEFAULT_OPTIONS.randomSource): string {
  let bytes: Uint8Array;
  try {
    bytes = randomSource(TOKEN_BYTES);
  } catch (error) {
    throw new XSRFEntropyError('Secure random source failed', { cause: error });
  }
  if (bytes.byteLength !== TOKEN_BYTES) {
    throw new XSRFEntropyError(`Secure random source returned ${bytes.byteLength} bytes, expected ${TOKEN_BYTES}`);
  }
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Set-Cookie value carrying the token
 */
export function xsrfCookie(token: string): string {
  return `${XSRF_COOKIE_NAME}=${token}; Path=/; HttpOnly`;
}

/**
 * Check the XSRF token before `next`. Disabled, it returns `next` itself.
 */
export function xsrfGuard(checkXSRF: boolean, next: Handler, options: XSRFOptions = {}): Handler {
  if (!checkXSRF) {
    return next;
  }

  const randomSource = options.randomSource ?? DEFAULT_OPTIONS.randomSource;
  const protectedMethods = new Set(
    (options.protectedMethods ?? DEFAULT_OPTIONS.protectedMethods).map((m) => m.toUpperCase()),
  );

  return handlerFunc((req) => {
    let token = req.cookie.get(XSRF_COOKIE_NAME);

    if (token === undefined || token.length !== TOKEN_LENGTH) {
      const issued = generateXSRFToken(randomSource);
      const cookie = xsrfCookie(issued);
      req.filterRespond((status, header) => {
        header.append('Set-Cookie', cookie);
        return [status, header];
      });
      addSpanEvent('xsrf.issued');
      token = issued;
    }

    if (token !== req.param.getDef(XSRF_PARAM_NAME, '')) {
      req.param.set(XSRF_PARAM_NAME, token);
      if (protectedMethods.has(req.method)) {
        addSpanEvent('xsrf.rejected', { 'http.method': req.method });
        req.error(STATUS_NOT_FOUND, new RequestError('BAD_XSRF_TOKEN', 'Bad XSRF token'));
        return;
      }
    }

    next.serve(req);
  });
}
