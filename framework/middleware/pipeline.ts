/**
 * Middleware Pipeline
 *
 * Composes handler decorators in the onion model: the first middleware added
 * is the outermost. Each middleware can:
 * - Inspect/modify the request before the next handler
 * - Short-circuit through the request's error handler
 * - Install a response filter that sees the response when it is emitted
 */

import type { Handler, Middleware } from '../http/types.ts';

/**
 * Ordered list of middleware
 */
export class HandlerPipeline {
  private middleware: Middleware[] = [];

  /**
   * Add middleware to the pipeline
   */
  use(middleware: Middleware): this {
    this.middleware.push(middleware);
    return this;
  }

  /**
   * Wrap the final handler in every middleware
   */
  build(finalHandler: Handler): Handler {
    return compose(...this.middleware)(finalHandler);
  }
}

/**
 * Compose middleware into one; the first argument is outermost
 */
export function compose(...middleware: Middleware[]): Middleware {
  return (next) => middleware.reduceRight((handler, mw) => mw(handler), next);
}
