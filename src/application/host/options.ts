/**
 * state-invoker - Invoker Options
 *
 * @module application/host/options
 */

import { createConsoleLogger, type ILogger, type LogLevel } from '../../infrastructure/logging/logger';
import { DEFAULT_ATTRIBUTE_KEYS, type AttributeKeys, type IArgumentValueResolver } from '../resolvers/IArgumentValueResolver';
import { DEFAULT_PAYLOAD_ALIASES } from '../resolvers/PayloadValueResolver';
import { URI_VAR_RESOLVER_PRIORITY } from '../resolvers/UriVarValueResolver';

/**
 * An extra resolver and its place in the chain
 */
export interface ResolverRegistration {
  resolver: IArgumentValueResolver;

  /** Defaults to 0 */
  priority?: number;
}

/**
 * Invoker configuration
 */
export interface InvokerOptions {
  /** Logger; defaults to a console logger at `logLevel` */
  logger?: ILogger;

  /** Threshold of the default console logger (default: `info`) */
  logLevel?: LogLevel;

  /** Parameter names receiving the write payload (default: `data`, `input`) */
  payloadAliases?: readonly string[];

  /** Carrier attribute keys */
  attributeKeys?: Partial<AttributeKeys>;

  /** Number of classes whose construction metadata is cached (default: 256) */
  typeCacheCapacity?: number;

  /** Chain position of the URI variable resolver (default: 150) */
  uriVarResolverPriority?: number;

  /** Additional resolvers */
  resolvers?: readonly ResolverRegistration[];
}

export interface ResolvedInvokerOptions {
  logger: ILogger;
  logLevel: LogLevel;
  payloadAliases: readonly string[];
  attributeKeys: AttributeKeys;
  typeCacheCapacity: number;
  uriVarResolverPriority: number;
  resolvers: readonly ResolverRegistration[];
}

export const DEFAULT_INVOKER_OPTIONS: Readonly<Omit<ResolvedInvokerOptions, 'logger'>> = Object.freeze({
  logLevel: 'info',
  payloadAliases: DEFAULT_PAYLOAD_ALIASES,
  attributeKeys: DEFAULT_ATTRIBUTE_KEYS,
  typeCacheCapacity: 256,
  uriVarResolverPriority: URI_VAR_RESOLVER_PRIORITY,
  resolvers: [],
});

/**
 * Merge user options over the defaults.
 *
 * @throws {RangeError} non-positive or non-integer cache capacity
 */
export function resolveInvokerOptions(options: InvokerOptions = {}): ResolvedInvokerOptions {
  const logLevel = options.logLevel ?? DEFAULT_INVOKER_OPTIONS.logLevel;
  const typeCacheCapacity = options.typeCacheCapacity ?? DEFAULT_INVOKER_OPTIONS.typeCacheCapacity;

  if (!Number.isInteger(typeCacheCapacity) || typeCacheCapacity < 1) {
    throw new RangeError(`typeCacheCapacity must be a positive integer, got ${typeCacheCapacity}`);
  }

  return {
    logger: options.logger ?? createConsoleLogger({ level: logLevel, prefix: 'state-invoker' }),
    logLevel,
    payloadAliases: options.payloadAliases ?? DEFAULT_INVOKER_OPTIONS.payloadAliases,
    attributeKeys: { ...DEFAULT_INVOKER_OPTIONS.attributeKeys, ...options.attributeKeys },
    typeCacheCapacity,
    uriVarResolverPriority: options.uriVarResolverPriority ?? DEFAULT_INVOKER_OPTIONS.uriVarResolverPriority,
    resolvers: options.resolvers ?? DEFAULT_INVOKER_OPTIONS.resolvers,
  };
}
