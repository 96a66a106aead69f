/**
 * state-invoker - Logging
 *
 * Minimal logger contract used across the engine. Any logger exposing the
 * four level methods (console, pino, winston...) can be passed in.
 */

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  /** Lowest level written (default: `info`) */
  level?: LogLevel;

  /** Prefix placed before the level tag */
  prefix?: string;
}

/**
 * Console logger writing every level
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

/**
 * Create a console logger that drops messages below `level`.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'debug', prefix: 'invoker' });
 * logger.debug('Dispatching', { id: 'app.create_user' });
 * // [invoker] [DEBUG] Dispatching { id: 'app.create_user' }
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ILogger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const tag = options.prefix ? `[${options.prefix}] ` : '';
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= threshold;

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(`${tag}[DEBUG] ${message}`, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.info(`${tag}[INFO] ${message}`, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(`${tag}[WARN] ${message}`, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(`${tag}[ERROR] ${message}`, ...args);
    },
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: ILogger = createConsoleLogger({ level: 'silent' });
