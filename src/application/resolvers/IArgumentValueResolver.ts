/**
 * state-invoker - Argument Value Resolver Contract
 *
 * @module application/resolvers/IArgumentValueResolver
 */

import type { InvocationRequest } from '../../domain/context/InvocationRequest';
import type { ParameterDescriptor } from '../../domain/types/ParameterDescriptor';

/**
 * Outcome of one resolver for one parameter. A resolved `null` or
 * `undefined` is a value; declining is `{ resolved: false }`.
 */
export type Resolution = { readonly resolved: true; readonly value: unknown } | { readonly resolved: false };

export const UNRESOLVED: Resolution = Object.freeze({ resolved: false });

export function resolved(value: unknown): Resolution {
  return { resolved: true, value };
}

/**
 * Carrier attribute keys written by the invocation bridge
 */
export interface AttributeKeys {
  /** Merged raw named values (URI variables) */
  routeParams: string;

  /** The matched {@link Operation} */
  operation: string;
}

export const DEFAULT_ATTRIBUTE_KEYS: Readonly<AttributeKeys> = Object.freeze({
  routeParams: 'route-params',
  operation: 'operation',
});

/**
 * What a resolver can see while resolving one handler call
 */
export interface ArgumentContext {
  readonly request: InvocationRequest;

  /** Input of a write call; absent for reads */
  readonly payload?: unknown;

  /** Handler name, for error messages */
  readonly handler: string;
}

/**
 * Supplies a value for a handler parameter, or declines.
 *
 * @example
 * ```typescript
 * class TenantResolver implements IArgumentValueResolver {
 *   resolve(parameter: ParameterDescriptor, { request }: ArgumentContext): Resolution {
 *     if (parameter.name !== 'tenant') return UNRESOLVED;
 *     return resolved(request.headers['x-tenant'] ?? null);
 *   }
 * }
 * ```
 */
export interface IArgumentValueResolver {
  resolve(parameter: ParameterDescriptor, context: ArgumentContext): Resolution;
}

/**
 * Plain object check for attribute values holding records
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
