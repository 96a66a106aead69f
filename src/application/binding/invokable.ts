/**
 * state-invoker - Invokable Handler Signatures
 *
 * JavaScript functions carry no parameter types at run time, so a handler
 * reached through the dynamic path declares its parameters once with
 * {@link defineInvokable}. The signature is kept in a registry keyed by the
 * function itself.
 *
 * @module application/binding/invokable
 */

import { InvalidSignatureError } from '../../domain/exceptions/exceptions';
import { describeParameter, type ParameterDescriptor } from '../../domain/types/ParameterDescriptor';
import { isTypeRef, type TypeRef } from '../../domain/types/TypeRef';

/**
 * Any function the dynamic path can call
 */
export type InvokableHandler = (...args: never[]) => unknown;

export interface ArgOptions {
  /** Raw value key feeding this parameter instead of its name */
  bind?: string;

  /** Accept `null`; same as listing `'null'` among the types */
  nullable?: boolean;

  /** Value used when no resolver supplies one */
  default?: unknown;

  /** Collect every remaining value (last parameter only) */
  variadic?: boolean;
}

const signatures = new WeakMap<object, readonly ParameterDescriptor[]>();

/**
 * Describe one handler parameter.
 *
 * @param type - a type reference, a union as a list, or nothing for untyped
 *
 * @example
 * ```typescript
 * arg('companyId', CompanyId, { bind: 'companyId' });
 * arg('id', ['int', 'string']);
 * arg('filter', 'string', { nullable: true });
 * arg('limit', 'int', { default: 20 });
 * ```
 */
export function arg(name: string, type: TypeRef | readonly TypeRef[] = [], options: ArgOptions = {}): ParameterDescriptor {
  const declared: readonly TypeRef[] = isTypeRef(type) ? [type] : type;
  if (!declared.every(isTypeRef)) {
    throw new InvalidSignatureError(`Parameter "${name}" declares an unknown type`);
  }

  return describeParameter(name, declared, {
    nullable: options.nullable,
    variadic: options.variadic,
    bindingTag: options.bind,
    hasDefault: 'default' in options,
    defaultValue: options.default,
  });
}

/**
 * Attach a parameter signature to a handler and return the handler.
 *
 * @throws {InvalidSignatureError} duplicate names, or a variadic parameter
 * that is not the last one
 *
 * @example
 * ```typescript
 * export const createUser = defineInvokable(
 *   [arg('data', UserResource), arg('companyId', CompanyId), arg('operation', Operation)],
 *   async (data: UserResource, companyId: CompanyId, operation: Operation) => {
 *     return new UserResource({ ...data, companyId: companyId.toString() });
 *   },
 * );
 * ```
 */
export function defineInvokable<F extends InvokableHandler>(parameters: readonly ParameterDescriptor[], handler: F): F {
  const seen = new Set<string>();
  parameters.forEach((parameter, index) => {
    if (seen.has(parameter.name)) {
      throw new InvalidSignatureError(`Parameter "${parameter.name}" is declared twice`);
    }
    if (parameter.variadic && index !== parameters.length - 1) {
      throw new InvalidSignatureError(`Variadic parameter "${parameter.name}" must be the last one`);
    }
    seen.add(parameter.name);
  });

  signatures.set(handler, Object.freeze([...parameters]));
  return handler;
}

/**
 * Signature attached by {@link defineInvokable}, if any
 */
export function getInvokableSignature(handler: unknown): readonly ParameterDescriptor[] | undefined {
  if (typeof handler !== 'function') {
    return undefined;
  }
  return signatures.get(handler);
}

const CLASS_SOURCE = /^class[\s{]/;

/**
 * Plain callable: a function that is not a class constructor
 */
export function isInvokable(value: unknown): value is InvokableHandler {
  return typeof value === 'function' && !CLASS_SOURCE.test(Function.prototype.toString.call(value));
}

/**
 * Name used in error messages
 */
export function handlerName(handler: InvokableHandler): string {
  return handler.name || 'anonymous handler';
}
