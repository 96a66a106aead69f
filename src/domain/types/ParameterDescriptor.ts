/**
 * state-invoker - Parameter Descriptor
 *
 * @module domain/types/ParameterDescriptor
 */

import type { TypeRef } from './TypeRef';

/**
 * Declared shape of one handler or factory parameter.
 *
 * Descriptors are immutable and derived once per signature: handler
 * signatures store them when defined, class members when first introspected.
 *
 * @example
 * ```typescript
 * const descriptor: ParameterDescriptor = {
 *   name: 'companyId',
 *   types: [CompanyId],
 *   nullable: false,
 *   bindingTag: 'company',
 *   variadic: false,
 *   hasDefault: false,
 * };
 * ```
 */
export interface ParameterDescriptor {
  /** Parameter name, unique within its signature */
  readonly name: string;

  /**
   * Declared types in declaration order, without the `'null'` variant.
   * Empty for untyped parameters, more than one entry for unions.
   */
  readonly types: readonly TypeRef[];

  /** Whether `null` is an accepted value */
  readonly nullable: boolean;

  /** Raw value key that overrides name matching */
  readonly bindingTag?: string;

  /** Collects every remaining value */
  readonly variadic: boolean;

  /** Whether `defaultValue` applies when nothing resolves the parameter */
  readonly hasDefault: boolean;

  readonly defaultValue?: unknown;
}

/**
 * Build a descriptor from a list of type references, folding `'null'` into
 * the nullable flag.
 */
export function describeParameter(
  name: string,
  declared: readonly TypeRef[],
  options: Partial<Pick<ParameterDescriptor, 'bindingTag' | 'variadic' | 'nullable'>> & {
    defaultValue?: unknown;
    hasDefault?: boolean;
  } = {},
): ParameterDescriptor {
  const types = declared.filter((type) => type !== 'null');
  const descriptor: ParameterDescriptor = {
    name,
    types,
    nullable: options.nullable === true || types.length !== declared.length,
    variadic: options.variadic === true,
    hasDefault: options.hasDefault === true,
    ...(options.bindingTag !== undefined ? { bindingTag: options.bindingTag } : {}),
    ...(options.hasDefault === true ? { defaultValue: options.defaultValue } : {}),
  };
  return Object.freeze(descriptor);
}
