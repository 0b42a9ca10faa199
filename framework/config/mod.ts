/**
 * Configuration & Environment Management
 *
 * Pipeline settings: body limit, XSRF checking, debug logging and log level.
 */

export {
  Config,
  ConfigError,
  configSchema,
  configFromEnv,
  loadConfig,
  type ConfigOptions,
  type ResolvedConfig,
} from './config.ts';
