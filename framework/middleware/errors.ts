/**
 * Error Handler Middleware
 */

import { handlerFunc, type ErrorHandler, type Handler } from '../http/types.ts';

/**
 * Install `errorHandler` on the request, then run `next`.
 * Handlers further down may install a more specific one.
 */
export function setErrorHandler(errorHandler: ErrorHandler, next: Handler): Handler {
  return handlerFunc((req) => {
    req.errorHandler = errorHandler;
    next.serve(req);
  });
}
