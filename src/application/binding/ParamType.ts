/**
 * state-invoker - Parameter Type Acceptance & Coercion
 *
 * Single source of truth for deciding whether a raw value satisfies a
 * declared parameter, and for converting raw scalars into the declared
 * primitive kind. Used by the resolver chain and the construction resolver.
 *
 * Acceptance is lenient for a single declared type and strict for unions:
 *
 * | Kind     | Single type                                   | Union branch      |
 * |----------|-----------------------------------------------|-------------------|
 * | `string` | strings, numbers, booleans, stringable objects | strings           |
 * | `int`    | safe integers, numeric strings within range   | safe integers     |
 * | `float`  | numbers, numeric strings                      | numbers           |
 * | `bool`   | booleans, `'true' 'false' '1' '0' 1 0`        | booleans          |
 * | `array`  | arrays                                        | arrays            |
 * | `object` | non-null, non-array objects                   | same              |
 * | `any`    | everything                                    | everything        |
 * | class    | instances of the class                        | same              |
 *
 * @module application/binding/ParamType
 */

import type { ParameterDescriptor } from '../../domain/types/ParameterDescriptor';
import { isPrimitiveKind, type PrimitiveKind, type TypeRef } from '../../domain/types/TypeRef';

const NUMERIC_STRING = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

const BOOLEAN_LIKE: readonly unknown[] = [true, false, 'true', 'false', '1', '0', 1, 0];
const TRUTHY: readonly unknown[] = ['true', '1', 1];
const FALSY: readonly unknown[] = ['false', '0', 0];

/**
 * The declared part of a parameter that acceptance depends on
 */
export type AcceptanceTarget = Pick<ParameterDescriptor, 'types' | 'nullable'>;

/**
 * Finite number, or a string holding one (surrounding whitespace, sign,
 * fraction and exponent allowed).
 */
export function isNumeric(value: unknown): boolean {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return typeof value === 'string' && NUMERIC_STRING.test(value);
}

/**
 * Object with its own string conversion, i.e. a `toString` other than the
 * one inherited from `Object.prototype`.
 */
export function isStringable(value: unknown): value is { toString(): string } {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return 'toString' in value && typeof value.toString === 'function' && value.toString !== Object.prototype.toString;
}

/**
 * Integer a numeric value truncates to, when it is a safe integer
 */
function toSafeInteger(value: unknown): number | undefined {
  if (!isNumeric(value)) {
    return undefined;
  }
  const integer = Math.trunc(Number(value));
  return Number.isSafeInteger(integer) ? integer : undefined;
}

function isPlainObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check a value against one declared type.
 *
 * @param strict - union semantics: no cross-kind leniency
 */
export function acceptsType(type: TypeRef, value: unknown, strict = false): boolean {
  if (!isPrimitiveKind(type)) {
    return type !== 'null' && value instanceof type;
  }

  switch (type) {
    case 'string':
      return (
        typeof value === 'string' ||
        (!strict && (typeof value === 'number' || typeof value === 'boolean' || isStringable(value)))
      );
    case 'int':
      return (
        (typeof value === 'number' && Number.isSafeInteger(value)) ||
        (!strict && typeof value === 'string' && toSafeInteger(value) !== undefined)
      );
    case 'float':
      return typeof value === 'number' || (!strict && typeof value === 'string' && isNumeric(value));
    case 'bool':
      return typeof value === 'boolean' || (!strict && BOOLEAN_LIKE.includes(value));
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isPlainObject(value);
    case 'any':
      return true;
  }
}

/**
 * Check whether a raw value satisfies a declared parameter.
 *
 * @example
 * ```typescript
 * accepts({ types: ['int'], nullable: false }, '123');           // true
 * accepts({ types: ['int'], nullable: false }, 1.5);             // false
 * accepts({ types: ['string', 'int'], nullable: false }, 1.5);   // false
 * accepts({ types: ['string'], nullable: true }, null);          // true
 * ```
 */
export function accepts(target: AcceptanceTarget, value: unknown): boolean {
  const { types, nullable } = target;
  if (types.length === 0) {
    return true;
  }

  if (value === null || value === undefined) {
    return nullable || types.includes('any');
  }

  const strict = types.length > 1;
  return types.some((type) => acceptsType(type, value, strict));
}

/**
 * Convert a raw value to a primitive kind. Values that cannot be converted
 * are returned unchanged.
 */
export function coerce(kind: PrimitiveKind, value: unknown): unknown {
  switch (kind) {
    case 'string':
      if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
        return String(value);
      }
      return isStringable(value) ? value.toString() : value;
    case 'int':
      return toSafeInteger(value) ?? value;
    case 'float':
      return isNumeric(value) ? Number(value) : value;
    case 'bool':
      if (TRUTHY.includes(value)) return true;
      if (FALSY.includes(value)) return false;
      return Boolean(value);
    case 'array':
      return Array.isArray(value) ? value : [value];
    case 'object':
    case 'any':
      return value;
  }
}

/**
 * Coerce a value to the parameter's kind when it declares exactly one
 * primitive type. Unions, class types and untyped parameters pass the value
 * through, as does `null` on a nullable parameter.
 */
export function narrow(target: AcceptanceTarget, value: unknown): unknown {
  const [only, ...rest] = target.types;
  if (only === undefined || rest.length > 0 || !isPrimitiveKind(only)) {
    return value;
  }
  if ((value === null || value === undefined) && target.nullable) {
    return value;
  }
  return coerce(only, value);
}
