/**
 * formgate
 *
 * Request-processing middleware for form-based HTTP applications: body limit
 * and form parsing, XSRF protection, request-scoped error handlers and debug
 * logging, all built on composable response filters.
 */

export * from './http/mod.ts';
export * from './middleware/mod.ts';
export * from './config/mod.ts';
export * from './telemetry/mod.ts';
export { createApplicationHandler, createLogger, type ApplicationOptions } from './app.ts';
