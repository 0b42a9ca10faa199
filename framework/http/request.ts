/**
 * Request Object
 *
 * Per-request state handed through every handler. The transport fills in the
 * request line, headers, cookies and raw body; middleware populates the
 * parameter map and may replace the responder and error handler.
 */

import { STATUS_CODES } from 'node:http';

import { StringsMap, type StringsMapInit } from './strings_map.ts';
import { filterRespond } from './responder.ts';
import type { ErrorHandler, ResponseBody, Responder, ResponseFilter } from './types.ts';

export interface WebRequestInit {
  method?: string;
  url?: string;
  protocolVersion?: string;
  remoteAddr?: string;
  header?: StringsMapInit;
  param?: StringsMapInit;
  cookie?: StringsMapInit;
  body?: Uint8Array | string;
  /** Declared body length; taken from the Content-Length header when omitted */
  contentLength?: number;
  responder: Responder;
  errorHandler?: ErrorHandler;
}

/**
 * Error handler used until middleware installs another: plain text status line
 */
export const defaultErrorHandler: ErrorHandler = (req, status) => {
  const header = StringsMap.headers({ 'Content-Type': 'text/plain; charset=utf-8' });
  const body = req.respond(status, header);
  body.write(STATUS_CODES[status] ?? `Status ${status}`);
  body.end();
};

/**
 * HTTP request
 */
export class WebRequest {
  readonly method: string;
  readonly url: string;
  readonly protocolVersion: string;
  readonly remoteAddr: string;
  readonly contentType: string;
  readonly contentLength: number;
  readonly body: Uint8Array;
  readonly header: StringsMap;
  readonly param: StringsMap;
  readonly cookie: StringsMap;
  responder: Responder;
  errorHandler: ErrorHandler;

  constructor(init: WebRequestInit) {
    this.method = (init.method ?? 'GET').toUpperCase();
    this.url = init.url ?? '/';
    this.protocolVersion = init.protocolVersion ?? '1.1';
    this.remoteAddr = init.remoteAddr ?? '';
    this.header = StringsMap.headers(init.header);
    this.param = new StringsMap(init.param);
    this.cookie = new StringsMap(init.cookie);
    this.body = typeof init.body === 'string'
      ? new TextEncoder().encode(init.body)
      : init.body ?? new Uint8Array(0);
    this.contentType = this.header.getDef('Content-Type', '');
    this.contentLength = init.contentLength ?? parseContentLength(this.header.get('Content-Length'));
    this.responder = init.responder;
    this.errorHandler = init.errorHandler ?? defaultErrorHandler;
  }

  /**
   * Query string without the leading '?'
   */
  get query(): string {
    const index = this.url.indexOf('?');
    return index === -1 ? '' : this.url.slice(index + 1);
  }

  /**
   * Emit status and headers through the current responder
   */
  respond(status: number, header: StringsMap = StringsMap.headers()): ResponseBody {
    return this.responder.respond(status, header);
  }

  /**
   * Replace the current responder with one filtered through `filter`
   */
  filterRespond(filter: ResponseFilter): void {
    filterRespond(this, filter);
  }

  /**
   * Report an error through the current error handler
   */
  error(status: number, reason: Error): void {
    this.errorHandler(this, status, reason);
  }
}

function parseContentLength(value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return -1;
  }
  return Number(value.trim());
}
