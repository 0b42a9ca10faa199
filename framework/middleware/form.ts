/**
 * Form Middleware
 *
 * Enforces the request body limit and parses URL-encoded parameters from the
 * query string and the body before the application handler runs.
 */

import { RequestError } from '../http/errors.ts';
import type { WebRequest } from '../http/request.ts';
import { StringsMap } from '../http/strings_map.ts';
import { handlerFunc, type Handler } from '../http/types.ts';
import { addSpanEvent } from '../telemetry/otel.ts';
import { xsrfGuard, type XSRFOptions } from './xsrf.ts';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

const STATUS_BAD_REQUEST = 400;
const STATUS_REQUEST_ENTITY_TOO_LARGE = 413;
const STATUS_EXPECTATION_FAILED = 417;

function decodeComponent(raw: string): string {
  try {
    return decodeURIComponent(raw.replace(/\+/g, ' '));
  } catch (error) {
    throw new RequestError('MALFORMED_FORM', `Invalid escape in form data: ${raw}`, { cause: error });
  }
}

/**
 * Parse `a=1&b=2` into the map. Throws RequestError on a malformed escape.
 */
export function parseUrlEncoded(text: string, into: StringsMap = new StringsMap()): StringsMap {
  for (const pair of text.split('&')) {
    if (pair === '') continue;
    const eq = pair.indexOf('=');
    const key = eq === -1 ? pair : pair.slice(0, eq);
    const value = eq === -1 ? '' : pair.slice(eq + 1);
    into.append(decodeComponent(key), decodeComponent(value));
  }
  return into;
}

function isFormContentType(contentType: string): boolean {
  const mediaType = contentType.split(';')[0] ?? '';
  return mediaType.trim().toLowerCase() === FORM_CONTENT_TYPE;
}

/**
 * Parse the query string and a URL-encoded body into req.param.
 * On failure req.param is left as it was.
 */
export function parseForm(req: WebRequest): void {
  const parsed = parseUrlEncoded(req.query);

  if (isFormContentType(req.contentType) && req.body.byteLength > 0) {
    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(req.body);
    } catch (error) {
      throw new RequestError('MALFORMED_FORM', 'Form body is not valid UTF-8', { cause: error });
    }
    parseUrlEncoded(text, parsed);
  }

  req.param.merge(parsed);
}

/**
 * Reject bodies over `maxRequestBodyLen` and parse the form before `next`
 */
export function formGate(maxRequestBodyLen: number, next: Handler): Handler {
  return handlerFunc((req) => {
    if (req.contentLength > maxRequestBodyLen) {
      const expect = req.header.has('Expect');
      const status = expect ? STATUS_EXPECTATION_FAILED : STATUS_REQUEST_ENTITY_TOO_LARGE;
      addSpanEvent('formgate.rejected', { 'http.status_code': status });
      req.error(
        status,
        new RequestError(
          expect ? 'EXPECTATION_FAILED' : 'ENTITY_TOO_LARGE',
          `Request entity too large: ${req.contentLength} > ${maxRequestBodyLen}`,
        ),
      );
      return;
    }

    try {
      parseForm(req);
    } catch (error) {
      if (!(error instanceof RequestError)) throw error;
      addSpanEvent('formgate.rejected', { 'http.status_code': STATUS_BAD_REQUEST });
      req.error(STATUS_BAD_REQUEST, error);
      return;
    }

    next.serve(req);
  });
}

/**
 * Body limit, form parsing and optional XSRF check, in that order
 */
export function processForm(
  maxRequestBodyLen: number,
  checkXSRF: boolean,
  next: Handler,
  options?: XSRFOptions,
): Handler {
  return formGate(maxRequestBodyLen, xsrfGuard(checkXSRF, next, options));
}
