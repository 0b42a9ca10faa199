/**
 * Structured Logging
 *
 * Leveled logger with bound context. Entries go to a pluggable sink; the
 * default sink prints one JSON line per entry, or a colored block in the
 * pretty format where multi-line messages (request dumps) stay readable.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export type LogOutput = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  context?: Record<string, unknown>;
  output?: LogOutput;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

function jsonOutput(entry: LogEntry): void {
  console.log(JSON.stringify(entry));
}

function prettyOutput(entry: LogEntry): void {
  const level = COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + RESET;
  const [first = '', ...rest] = entry.message.split('\n');
  const lines = [`${DIM}${entry.timestamp}${RESET} ${level} ${first}`, ...rest];

  if (entry.context && Object.keys(entry.context).length > 0) {
    lines[0] += ` ${DIM}${JSON.stringify(entry.context)}${RESET}`;
  }
  if (entry.error?.stack) {
    lines.push(DIM + entry.error.stack + RESET);
  }

  console.log(lines.join('\n'));
}

/**
 * Structured logger
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly format: 'json' | 'pretty';
  private readonly context: Record<string, unknown>;
  private readonly output: LogOutput;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? (this.format === 'json' ? jsonOutput : prettyOutput);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Logger sharing level and sink, with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    this.output(entry);
  }
}

let defaultLogger: Logger | null = null;

/**
 * Process-wide logger: pretty and verbose outside production
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const production = process.env.NODE_ENV === 'production';
    defaultLogger = new Logger({
      level: production ? 'info' : 'debug',
      format: production ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
