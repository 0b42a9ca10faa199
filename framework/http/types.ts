/**
 * HTTP Type Definitions
 */

import type { WebRequest } from './request.ts';
import type { StringsMap } from './strings_map.ts';

/**
 * Body writer returned once the status and headers are emitted
 */
export interface ResponseBody {
  write(chunk: string | Uint8Array): void;
  end(): void;
}

/**
 * Capability to emit one status and header set, then a body
 */
export interface Responder {
  respond(status: number, header: StringsMap): ResponseBody;
}

/**
 * Transform applied to the arguments of Responder.respond
 */
export type ResponseFilter = (status: number, header: StringsMap) => [number, StringsMap];

/**
 * Request-scoped error callback
 */
export type ErrorHandler = (req: WebRequest, status: number, reason: Error) => void;

/**
 * Request handler
 */
export interface Handler {
  serve(req: WebRequest): void;
}

/**
 * Handler decorator: wraps the next handler
 */
export type Middleware = (next: Handler) => Handler;

/**
 * Adapt a plain function to the Handler interface
 */
export function handlerFunc(fn: (req: WebRequest) => void): Handler {
  return { serve: fn };
}
