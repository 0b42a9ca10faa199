/**
 * Telemetry & Observability
 *
 * Structured logging and span annotation for the request pipeline.
 */

export {
  Logger,
  getLogger,
  setLogger,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
  type LogOutput,
} from './logger.ts';

export {
  getActiveSpan,
  addSpanEvent,
  trace,
  type Attributes,
  type Span,
} from './otel.ts';
