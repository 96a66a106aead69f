/**
 * state-invoker - Default Value Resolver
 *
 * Last in the chain: the declared default, or `null` for a typed nullable
 * parameter.
 *
 * @module application/resolvers/DefaultValueResolver
 */

import type { ParameterDescriptor } from '../../domain/types/ParameterDescriptor';
import { UNRESOLVED, resolved, type IArgumentValueResolver, type Resolution } from './IArgumentValueResolver';

export class DefaultValueResolver implements IArgumentValueResolver {
  resolve(parameter: ParameterDescriptor): Resolution {
    if (parameter.hasDefault) {
      return resolved(parameter.defaultValue);
    }
    if (parameter.types.length > 0 && parameter.nullable && !parameter.variadic) {
      return resolved(null);
    }
    return UNRESOLVED;
  }
}
