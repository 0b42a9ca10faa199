/**
 * Configuration Management
 *
 * Loads pipeline settings from defaults, an optional JSON file and the
 * environment, validated against a single schema.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const envBoolean = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const configSchema = z.object({
  env: z.string().default('development'),
  logLevel: logLevelSchema.default('info'),
  maxRequestBodyLen: z.number().int().nonnegative().default(1024 * 1024),
  checkXSRF: z.boolean().default(true),
  debugLoggingEnabled: z.boolean().default(false),
});

export type ConfigOptions = z.input<typeof configSchema>;
export type ResolvedConfig = z.output<typeof configSchema>;

/**
 * Invalid configuration value
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

function parseConfig(input: unknown, source: string): ResolvedConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration from ${source}: ${details}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Configuration manager
 */
export class Config {
  private config: ResolvedConfig;

  constructor(options: ConfigOptions = {}) {
    this.config = parseConfig(options, 'options');
  }

  /**
   * Validate untyped input, e.g. parsed JSON
   */
  static parse(input: unknown, source = 'input'): Config {
    return new Config(parseConfig(input, source));
  }

  /**
   * Get a configuration value
   */
  get<K extends keyof ResolvedConfig>(key: K): ResolvedConfig[K] {
    return this.config[key];
  }

  /**
   * Set a configuration value; the result is validated
   */
  set<K extends keyof ResolvedConfig>(key: K, value: ResolvedConfig[K]): void {
    this.config = parseConfig({ ...this.config, [key]: value }, `set(${key})`);
  }

  /**
   * Get all configuration
   */
  all(): ResolvedConfig {
    return { ...this.config };
  }
}

const fileSchema = z.union([
  z.object({ formgate: z.record(z.unknown()) }).transform((file) => file.formgate),
  z.record(z.unknown()),
]);

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  const content = await readFile(path, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, { cause: error });
  }
  const result = fileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`, { cause: result.error });
  }
  return result.data;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read overrides from the environment
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  const parseEnv = (name: string, schema: z.ZodTypeAny): unknown => {
    const result = schema.safeParse(env[name]);
    if (!result.success) {
      throw new ConfigError(`Invalid value for ${name}: ${env[name]}`, { cause: result.error });
    }
    return result.data;
  };

  if (env.MAX_REQUEST_BODY_LEN !== undefined) {
    overrides.maxRequestBodyLen = parseEnv(
      'MAX_REQUEST_BODY_LEN',
      z.string().regex(/^\d+$/).transform(Number),
    );
  }
  if (env.CHECK_XSRF !== undefined) {
    overrides.checkXSRF = parseEnv('CHECK_XSRF', envBoolean);
  }
  if (env.DEBUG_LOGGING !== undefined) {
    overrides.debugLoggingEnabled = parseEnv('DEBUG_LOGGING', envBoolean);
  }
  if (env.LOG_LEVEL !== undefined) {
    overrides.logLevel = parseEnv('LOG_LEVEL', logLevelSchema);
  }
  if (env.NODE_ENV !== undefined) {
    overrides.env = env.NODE_ENV;
  }

  return overrides;
}

/**
 * Load configuration from a JSON file and the environment.
 * Without a path, ./config/app.json is used when present.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Config> {
  let fileConfig: Record<string, unknown> = {};

  if (configPath) {
    fileConfig = await readConfigFile(configPath);
  } else {
    try {
      fileConfig = await readConfigFile('./config/app.json');
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }

  return Config.parse({ ...fileConfig, ...configFromEnv(env) }, configPath ?? 'environment');
}
