/**
 * state-invoker - Type References
 *
 * Runtime descriptions of declared parameter types. A declared type is either
 * one of the primitive kinds below or a class reference; unions are modelled
 * as ordered lists of type references.
 *
 * @module domain/types/TypeRef
 */

/**
 * Primitive kinds a parameter can declare.
 *
 * `int` and `float` are both JavaScript numbers at runtime; the distinction
 * only drives acceptance and coercion of raw values.
 */
export type PrimitiveKind = 'string' | 'int' | 'float' | 'bool' | 'array' | 'object' | 'any';

/**
 * Any class that can be used as a declared parameter type.
 */
export type ClassType<T = unknown> = new (...args: never[]) => T;

/**
 * A single branch of a declared type. `'null'` marks a nullable union.
 */
export type TypeRef = PrimitiveKind | 'null' | ClassType;

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
  'string',
  'int',
  'float',
  'bool',
  'array',
  'object',
  'any',
];

export function isPrimitiveKind(value: unknown): value is PrimitiveKind {
  return typeof value === 'string' && PRIMITIVE_KINDS.some((kind) => kind === value);
}

export function isClassType(value: unknown): value is ClassType {
  return typeof value === 'function';
}

export function isTypeRef(value: unknown): value is TypeRef {
  return value === 'null' || isPrimitiveKind(value) || isClassType(value);
}

/**
 * Human readable name of a type reference, used in error messages.
 */
export function typeName(type: TypeRef): string {
  if (typeof type === 'string') {
    return type;
  }
  return type.name || 'anonymous class';
}

/**
 * Check whether `type` is `base` or one of its subclasses.
 */
export function isSubclassOf(type: TypeRef, base: ClassType): boolean {
  return isClassType(type) && (type === base || type.prototype instanceof base);
}
