/**
 * Structured Logging Package
 * Provides JSON/pretty logging with scopes and child contexts
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

export interface LogContext {
  correlationId?: string;
  scope?: string;
  [key: string]: unknown;
}

export interface StructuredLogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/** Receives one finished line; `level` lets a sink route errors elsewhere. */
export type LogSink = (line: string, level: LogLevel) => void;

export interface LoggerOptions {
  format?: LogFormat;
  minLevel?: LogLevel;
  context?: LogContext;
  write?: LogSink;
  colors?: boolean;
}

export interface Logger {
  trace: (message: string, context?: LogContext) => void;
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, error?: Error, context?: LogContext) => void;
  child: (childContext: LogContext) => Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const LOG_LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m', // Gray
  debug: '\x1b[36m', // Cyan
  info: '\x1b[34m', // Blue
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

const RESET_COLOR = '\x1b[0m';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

function isLogFormat(value: unknown): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

// process is absent when the frontend bundle loads this module
function readEnv(name: string): string | undefined {
  return typeof process !== 'undefined' && process.env ? process.env[name] : undefined;
}

const defaultSink: LogSink = (line, level) => {
  if (level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

function stringifyValue(value: unknown): string {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'object' && value !== null) return JSON.stringify(value, bigintReplacer);
  return String(value);
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Create a structured logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envFormat = readEnv('LOG_FORMAT');
  const envLevel = readEnv('LOG_LEVEL');
  const format = options.format || (isLogFormat(envFormat) ? envFormat : 'pretty');
  const minLevel = options.minLevel || (isLogLevel(envLevel) ? envLevel : 'info');
  const baseContext = options.context || {};
  const write = options.write || defaultSink;
  const colors = options.colors ?? !options.write;

  const log = (level: LogLevel, message: string, error?: Error, context?: LogContext) => {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) {
      return;
    }

    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: { ...baseContext, ...context },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    if (format === 'json') {
      write(JSON.stringify(entry, bigintReplacer), level);
      return;
    }

    const levelStr = `[${level.toUpperCase()}]`.padEnd(7);
    const scopeStr = entry.context?.scope ? `[${entry.context.scope}]` : '';
    const corrIdStr = entry.context?.correlationId ? `[${entry.context.correlationId}]` : '';
    const levelOut = colors ? `${LOG_LEVEL_COLORS[level]}${levelStr}${RESET_COLOR}` : levelStr;

    let output = `${levelOut} ${scopeStr}${corrIdStr} ${message}`;

    // Include additional context keys (excluding scope and correlationId)
    const ctx = entry.context || {};
    const contextKeys = Object.keys(ctx).filter((k) => k !== 'scope' && k !== 'correlationId');
    if (contextKeys.length > 0) {
      const contextStr = contextKeys.map((k) => `${k}=${stringifyValue(ctx[k])}`).join(' ');
      output += ` ${contextStr}`;
    }

    if (error) {
      output += `\n  Error: ${error.message}`;
      if (error.stack) {
        output += `\n${error.stack.split('\n').slice(1).join('\n')}`;
      }
    }

    write(output, level);
  };

  const logger: Logger = {
    trace: (message, context) => log('trace', message, undefined, context),
    debug: (message, context) => log('debug', message, undefined, context),
    info: (message, context) => log('info', message, undefined, context),
    warn: (message, context) => log('warn', message, undefined, context),
    error: (message, error, context) => log('error', message, error, context),
    child: (childContext) =>
      createLogger({
        ...options,
        context: { ...baseContext, ...childContext },
      }),
  };

  return logger;
}

/**
 * Create a scoped logger (convenience function)
 */
export function createScopedLogger(scope: string, options: Omit<LoggerOptions, 'context'> = {}): Logger {
  return createLogger({
    ...options,
    context: { scope },
  });
}

/**
 * Generate a correlation ID for tracing one script run or purchase
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Normalize an unknown thrown value into an Error for `logger.error`
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : stringifyValue(value));
}
