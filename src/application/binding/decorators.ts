/**
 * state-invoker - Construction Metadata Decorators
 *
 * Declarative metadata read by the {@link TypeIntrospector}:
 *
 * - `@ConstructWith(method)` names the one static method allowed to build a
 *   value object from a raw value.
 * - `@Factory()` marks a static method as a factory candidate and makes the
 *   compiler emit its parameter and return types.
 * - `@Param(...types)` declares the accepted kinds of a constructor or factory
 *   parameter where the emitted design type is not precise enough
 *   (`int` against `float`, unions).
 * - `@Internal()` hides a constructor (on the class) or a static method from
 *   construction.
 *
 * @remarks
 * Requires `experimentalDecorators` and `emitDecoratorMetadata`, and
 * `reflect-metadata` loaded once before decorated classes are defined.
 *
 * @example
 * ```typescript
 * @ConstructWith('create')
 * @Internal()
 * class UserId {
 *   constructor(readonly value: number) {}
 *
 *   @Factory()
 *   static create(@Param('int', 'string') value: number | string): UserId {
 *     return new UserId(Math.trunc(Number(value)));
 *   }
 * }
 * ```
 *
 * @module application/binding/decorators
 */

import 'reflect-metadata';
import { isClassType, isTypeRef, type ClassType, type TypeRef } from '../../domain/types/TypeRef';

export const CONSTRUCT_WITH_KEY = 'invoker:construct-with';
export const FACTORY_RETURNS_KEY = 'invoker:factory-returns';
export const PARAM_TYPES_KEY = 'invoker:param-types';
export const INTERNAL_KEY = 'invoker:internal';

// ==================== Metadata helpers ====================

function defineOwn(key: string, value: unknown, target: object, propertyKey?: string | symbol): void {
  if (propertyKey === undefined) {
    Reflect.defineMetadata(key, value, target);
  } else {
    Reflect.defineMetadata(key, value, target, propertyKey);
  }
}

function readOwn(key: string, target: object, propertyKey?: string | symbol): unknown {
  return propertyKey === undefined
    ? Reflect.getOwnMetadata(key, target)
    : Reflect.getOwnMetadata(key, target, propertyKey);
}

function readTypeList(value: unknown): readonly TypeRef[] | undefined {
  if (Array.isArray(value) && value.every(isTypeRef)) {
    return value;
  }
  return undefined;
}

/**
 * Translate a type emitted by `emitDecoratorMetadata` into type references.
 * `Number` maps to `float`: the compiler cannot tell integers apart.
 */
export function fromDesignType(designType: unknown): readonly TypeRef[] {
  switch (designType) {
    case String:
      return ['string'];
    case Number:
      return ['float'];
    case Boolean:
      return ['bool'];
    case Array:
      return ['array'];
    case Object:
    case Function:
    case Symbol:
    case BigInt:
      return ['any'];
  }
  return isClassType(designType) ? [designType] : [];
}

// ==================== Decorators ====================

/**
 * Name the static method used to build instances of the decorated class.
 * The method must be static, public and take exactly one required parameter.
 */
export function ConstructWith(method: string): ClassDecorator {
  if (method.length === 0) {
    throw new TypeError('@ConstructWith() requires a method name');
  }
  return (target) => {
    Reflect.defineMetadata(CONSTRUCT_WITH_KEY, method, target);
  };
}

export interface FactoryOptions {
  /**
   * Declared return type, for toolchains that do not emit
   * `design:returntype`
   */
  returns?: ClassType;
}

/**
 * Mark a static method as a factory candidate.
 *
 * The constructor is a candidate too, but only when the class declares its
 * own: a subclass inheriting its parent's constructor reports no parameters
 * (`Function.length` is 0) and is never built through it.
 */
export function Factory(options: FactoryOptions = {}): MethodDecorator {
  return (target, propertyKey) => {
    if (typeof target !== 'function') {
      throw new TypeError(`@Factory() applies to static methods, not ${String(propertyKey)}()`);
    }
    const returns: unknown = options.returns ?? Reflect.getOwnMetadata('design:returntype', target, propertyKey);
    defineOwn(FACTORY_RETURNS_KEY, returns, target, propertyKey);
  };
}

/**
 * Declare the accepted types of a constructor or static method parameter.
 * Include `'null'` to make the parameter nullable.
 */
export function Param(...types: TypeRef[]): ParameterDecorator {
  if (types.length === 0 || !types.every(isTypeRef)) {
    throw new TypeError('@Param() requires at least one type reference');
  }
  const declared = Object.freeze([...types]);

  return (target, propertyKey, parameterIndex) => {
    const existing: unknown = readOwn(PARAM_TYPES_KEY, target, propertyKey);
    const byIndex: unknown[] = Array.isArray(existing) ? [...existing] : [];
    byIndex[parameterIndex] = declared;
    defineOwn(PARAM_TYPES_KEY, byIndex, target, propertyKey);
  };
}

/**
 * Exclude the constructor (when applied to the class) or a static method
 * from construction.
 */
export function Internal(): (target: object, propertyKey?: string | symbol, descriptor?: PropertyDescriptor) => void {
  return (target, propertyKey) => {
    defineOwn(INTERNAL_KEY, true, target, propertyKey);
  };
}

// ==================== Readers ====================

export function getConstructWith(type: ClassType): string | undefined {
  const method: unknown = Reflect.getOwnMetadata(CONSTRUCT_WITH_KEY, type);
  return typeof method === 'string' ? method : undefined;
}

export function isInternal(target: object, method?: string): boolean {
  return readOwn(INTERNAL_KEY, target, method) === true;
}

/**
 * Declared types of one parameter of the constructor (`method` omitted) or of
 * a static method: `@Param` first, then the emitted design type.
 *
 * @returns undefined when nothing is known about the parameter
 */
export function getParameterTypes(
  target: object,
  method: string | undefined,
  index: number,
): readonly TypeRef[] | undefined {
  const declared: unknown = readOwn(PARAM_TYPES_KEY, target, method);
  if (Array.isArray(declared)) {
    const types = readTypeList(declared[index]);
    if (types) {
      return types;
    }
  }

  const designTypes: unknown = readOwn('design:paramtypes', target, method);
  if (Array.isArray(designTypes) && index < designTypes.length) {
    return fromDesignType(designTypes[index]);
  }
  return undefined;
}

/**
 * Declared return type of a static method: the `@Factory` option, or the
 * emitted design type.
 */
export function getDeclaredReturnType(target: object, method: string): unknown {
  const returns: unknown = readOwn(FACTORY_RETURNS_KEY, target, method);
  return returns ?? readOwn('design:returntype', target, method);
}
