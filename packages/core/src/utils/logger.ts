/**
 * Minimal leveled logger.
 *
 * Lines go to stderr through `console.error` so that command output on
 * stdout stays machine-readable.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: Error): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function formatLogLine(
  level: Exclude<LogLevel, 'silent'>,
  message: string,
  context?: LogContext,
  error?: Error,
): string {
  let line = `[filter-dsl] ${level}: ${message}`;
  if (context && Object.keys(context).length > 0) {
    line += ` ${JSON.stringify(context)}`;
  }
  if (error) {
    line += ` (${error.name}: ${error.message})`;
  }
  return line;
}

/**
 * Create a logger that drops everything below `level`.
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug');
 * logger.debug('Parsed filter expression', { depth: 3 });
 * // [filter-dsl] debug: Parsed filter expression {"depth":3}
 * ```
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = SEVERITY[level];

  const write = (
    lineLevel: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: LogContext,
    error?: Error,
  ): void => {
    if (SEVERITY[lineLevel] < threshold) return;
    console.error(formatLogLine(lineLevel, message, context, error));
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context, error) => write('error', message, context, error),
  };
}

export const silentLogger: Logger = createLogger('silent');
