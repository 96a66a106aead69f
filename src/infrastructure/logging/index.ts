/**
 * state-invoker - Logging Module
 */

export { consoleLogger, createConsoleLogger, silentLogger } from './logger';
export type { ILogger, LogLevel, ConsoleLoggerOptions } from './logger';
