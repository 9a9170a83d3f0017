/**
 * Logger utility using Winston
 *
 * Provides structured logging with debug mode support.
 * All logs go to stderr so stdout stays usable for command output
 * (e.g. `mcp-openapi-bridge openapi` prints the document there).
 */

import winston from 'winston';
import chalk from 'chalk';

export type LogFormat = 'text' | 'json';

export interface LoggerOptions {
  debug?: boolean;
  /** Explicit winston level; wins over `debug` */
  level?: string;
  format?: LogFormat;
}

let logger: winston.Logger | undefined;

function colorLevel(level: string): string {
  const label = `[${level.toUpperCase()}]`;
  switch (level) {
    case 'error':
      return chalk.red(label);
    case 'warn':
      return chalk.yellow(label);
    case 'info':
      return chalk.green(label);
    case 'debug':
      return chalk.blue(label);
    default:
      return label;
  }
}

function textFormat(showTimestamp: boolean): winston.Logform.Format {
  return winston.format.printf(({ level, message, timestamp, component, ...meta }) => {
    const timestampStr = showTimestamp && typeof timestamp === 'string' ? `[${timestamp}] ` : '';
    const componentStr = typeof component === 'string' ? ` ${chalk.cyan(`[${component}]`)}` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';

    return `${timestampStr}${colorLevel(level)}${componentStr} ${String(message)}${metaStr}`.trim();
  });
}

/**
 * Initialize the logger
 */
export function initializeLogger(options: LoggerOptions = {}): winston.Logger {
  const debugMode = options.debug ?? false;

  const level = options.level ?? (debugMode ? 'debug' : 'info');
  const format = options.format ?? 'text';

  logger = winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({ format: format === 'json' ? undefined : 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      format === 'json' ? winston.format.json() : textFormat(debugMode)
    ),
    transports: [
      // stderrLevels routes every level to stderr; the Console transport defaults to stdout otherwise
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      }),
    ],
  });
  return logger;
}

function getLogger(): winston.Logger {
  return logger ?? initializeLogger();
}

export function logInfo(message: string, meta?: Record<string, unknown>): void {
  getLogger().info(message, meta);
}

export function logDebug(message: string, meta?: Record<string, unknown>): void {
  getLogger().debug(message, meta);
}

export function logWarn(message: string, meta?: Record<string, unknown>): void {
  getLogger().warn(message, meta);
}

/**
 * Log an error message. Error instances are flattened into message + stack.
 */
export function logError(message: string, error?: Error | Record<string, unknown>): void {
  if (error instanceof Error) {
    getLogger().error(message, { error: error.message, stack: error.stack });
  } else {
    getLogger().error(message, error);
  }
}
