/**
 * Debug Logging Middleware
 *
 * Logs every inbound request and, when it is emitted, the outbound status
 * and headers. Meant for development; disabled it costs nothing.
 */

import type { WebRequest } from '../http/request.ts';
import type { StringsMap } from '../http/strings_map.ts';
import { handlerFunc, type Handler } from '../http/types.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { addSpanEvent } from '../telemetry/otel.ts';

function formatStringsMap(title: string, map: StringsMap): string[] {
  if (map.size === 0) return [];
  const lines = [`  ${title}:`];
  for (const [key, values] of map) {
    for (const value of values) {
      lines.push(`    ${key}: ${value}`);
    }
  }
  return lines;
}

/**
 * Text snapshot of an inbound request
 */
export function formatRequest(req: WebRequest): string {
  return [
    'REQUEST',
    `  ${req.method} HTTP/${req.protocolVersion} ${req.url}`,
    `  RemoteAddr: ${req.remoteAddr}`,
    `  ContentType: ${req.contentType}`,
    `  ContentLength: ${req.contentLength}`,
    ...formatStringsMap('Header', req.header),
    ...formatStringsMap('Param', req.param),
    ...formatStringsMap('Cookie', req.cookie),
  ].join('\n');
}

/**
 * Text snapshot of an outbound status and header set
 */
export function formatResponse(status: number, header: StringsMap): string {
  return [
    'RESPONSE',
    `  Status: ${status}`,
    ...formatStringsMap('Header', header),
  ].join('\n');
}

// Logging never changes the outcome of a request
function safeLog(logger: Logger, format: () => string): void {
  try {
    logger.info(format());
  } catch (error) {
    addSpanEvent('debug_logger.failed', {
      'exception.message': error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Log the request and response around `next`. Disabled, it returns `next`.
 */
export function debugLogger(enabled: boolean, next: Handler, logger: Logger = getLogger()): Handler {
  if (!enabled) {
    return next;
  }

  return handlerFunc((req) => {
    safeLog(logger, () => formatRequest(req));
    req.filterRespond((status, header) => {
      safeLog(logger, () => formatResponse(status, header));
      return [status, header];
    });
    next.serve(req);
  });
}
