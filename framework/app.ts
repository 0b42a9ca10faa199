/**
 * Application Handler
 *
 * Wraps an application handler in the configured middleware stack:
 *
 *   debugLogger → setErrorHandler → formGate → xsrfGuard → handler
 */

import type { Config } from './config/config.ts';
import { defaultErrorHandler } from './http/request.ts';
import type { ErrorHandler, Handler } from './http/types.ts';
import { setErrorHandler } from './middleware/errors.ts';
import { processForm } from './middleware/form.ts';
import { debugLogger } from './middleware/logging.ts';
import { HandlerPipeline } from './middleware/pipeline.ts';
import type { XSRFOptions } from './middleware/xsrf.ts';
import { Logger } from './telemetry/logger.ts';

export interface ApplicationOptions {
  errorHandler?: ErrorHandler;
  logger?: Logger;
  xsrf?: XSRFOptions;
}

/**
 * Logger matching the configured level; JSON in production
 */
export function createLogger(config: Config): Logger {
  return new Logger({
    level: config.get('logLevel'),
    format: config.get('env') === 'production' ? 'json' : 'pretty',
  });
}

/**
 * Build the request handler for an application
 */
export function createApplicationHandler(
  config: Config,
  handler: Handler,
  options: ApplicationOptions = {},
): Handler {
  const logger = options.logger ?? createLogger(config);

  return new HandlerPipeline()
    .use((next) =>
      debugLogger(config.get('debugLoggingEnabled'), next, logger.child({ middleware: 'debugLogger' }))
    )
    .use((next) => setErrorHandler(options.errorHandler ?? defaultErrorHandler, next))
    .use((next) =>
      processForm(config.get('maxRequestBodyLen'), config.get('checkXSRF'), next, options.xsrf)
    )
    .build(handler);
}
