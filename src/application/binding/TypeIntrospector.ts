/**
 * state-invoker - Type Introspector
 *
 * Reads the construction surface of a class once (constructor, static
 * methods, tags) and caches it by class identity.
 *
 * @module application/binding/TypeIntrospector
 */

import { CacheManager, type CacheStats } from '../../infrastructure/cache/CacheManager';
import { describeParameter, type ParameterDescriptor } from '../../domain/types/ParameterDescriptor';
import type { ClassType } from '../../domain/types/TypeRef';
import { getConstructWith, getDeclaredReturnType, getParameterTypes, isInternal } from './decorators';

/**
 * One way of building an instance: the constructor or a static method
 */
export interface MethodDescriptor {
  /** `constructor` or the static method name */
  readonly name: string;

  readonly kind: 'constructor' | 'static';

  readonly isPublic: boolean;

  /** Parameters before the first optional one (`Function.length`) */
  readonly requiredParameters: number;

  /** Descriptor of the first parameter */
  readonly parameter: ParameterDescriptor;

  /** Declared return type, when known */
  readonly returnType?: unknown;

  invoke(value: unknown): unknown;
}

export interface TypeDescriptor {
  readonly type: ClassType;
  readonly name: string;

  /** Method named by `@ConstructWith`, if any */
  readonly constructWith?: string;

  readonly initializer: MethodDescriptor;

  /** Static methods in declaration order, own before inherited */
  readonly staticMethods: ReadonlyMap<string, MethodDescriptor>;

  /** Instance method names, for reporting tags that point at them */
  readonly instanceMethodNames: ReadonlySet<string>;
}

const FUNCTION_OWN_KEYS = new Set(['length', 'name', 'prototype', 'caller', 'arguments']);

function parameterOf(owner: object, method?: string): ParameterDescriptor {
  return describeParameter('value', getParameterTypes(owner, method, 0) ?? []);
}

function collectStaticMethods(type: ClassType): Map<string, MethodDescriptor> {
  const methods = new Map<string, MethodDescriptor>();

  let current: unknown = type;
  while (typeof current === 'function' && current !== Function.prototype) {
    for (const name of Object.getOwnPropertyNames(current)) {
      if (FUNCTION_OWN_KEYS.has(name) || methods.has(name)) {
        continue;
      }
      const fn: unknown = Object.getOwnPropertyDescriptor(current, name)?.value;
      if (typeof fn !== 'function') {
        continue;
      }

      methods.set(name, {
        name,
        kind: 'static',
        isPublic: !isInternal(current, name),
        requiredParameters: fn.length,
        parameter: parameterOf(current, name),
        returnType: getDeclaredReturnType(current, name),
        invoke: (value) => Reflect.apply(fn, type, [value]),
      });
    }
    current = Object.getPrototypeOf(current);
  }

  return methods;
}

function collectInstanceMethodNames(type: ClassType): Set<string> {
  const names = new Set<string>();

  let current: unknown = type.prototype;
  while (typeof current === 'object' && current !== null && current !== Object.prototype) {
    for (const name of Object.getOwnPropertyNames(current)) {
      if (name !== 'constructor') {
        names.add(name);
      }
    }
    current = Object.getPrototypeOf(current);
  }

  return names;
}

/**
 * Build the descriptor of a class without caching.
 *
 * Required parameter counts come from `Function.length`, so an inherited
 * constructor counts as taking none; declare the constructor on the subclass.
 */
export function introspect(type: ClassType): TypeDescriptor {
  const name = type.name || 'anonymous class';

  const initializer: MethodDescriptor = {
    name: 'constructor',
    kind: 'constructor',
    isPublic: !isInternal(type),
    requiredParameters: type.length,
    parameter: parameterOf(type),
    returnType: type,
    invoke: (value) => Reflect.construct(type, [value]),
  };

  const constructWith = getConstructWith(type);

  return Object.freeze({
    type,
    name,
    ...(constructWith !== undefined ? { constructWith } : {}),
    initializer,
    staticMethods: collectStaticMethods(type),
    instanceMethodNames: collectInstanceMethodNames(type),
  });
}

/**
 * Cached introspection
 *
 * @example
 * ```typescript
 * const introspector = new TypeIntrospector(256);
 * const { constructWith, staticMethods } = introspector.describe(CompanyId);
 * ```
 */
export class TypeIntrospector {
  private readonly cache: CacheManager<ClassType, TypeDescriptor>;

  constructor(capacity = 256) {
    this.cache = new CacheManager(capacity);
  }

  describe(type: ClassType): TypeDescriptor {
    return this.cache.getOrSet(type, () => introspect(type));
  }

  stats(): CacheStats {
    return this.cache.stats();
  }

  clear(): void {
    this.cache.clear();
  }
}
