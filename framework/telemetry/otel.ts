/**
 * OpenTelemetry Integration
 *
 * Annotates whatever span the host application has made active for the
 * current request. Without a registered SDK the API hands back no span and
 * every helper here is a no-op.
 *
 * @module
 */

import { trace, type Attributes, type Span } from '@opentelemetry/api';

/**
 * Get the currently active span, if any
 */
export function getActiveSpan(): Span | undefined {
  return trace.getActiveSpan();
}

/**
 * Add an event to the active span
 *
 * @param name - Event name
 * @param attributes - Optional event attributes
 */
export function addSpanEvent(name: string, attributes?: Attributes): void {
  const span = getActiveSpan();
  if (span) {
    span.addEvent(name, attributes);
  }
}

export { trace, type Attributes, type Span };
