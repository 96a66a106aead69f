/**
 * state-invoker - URI Variable Value Resolver
 *
 * Maps raw named values (URI variables) onto typed parameters.
 *
 * The raw key is the parameter's binding tag, or its own name when the merged
 * route parameters contain that name. Primitive parameters receive the
 * coerced value; class-typed parameters receive a value object built by the
 * {@link ValueObjectInstantiator}.
 *
 * @module application/resolvers/UriVarValueResolver
 */

import type { InvocationRequest } from '../../domain/context/InvocationRequest';
import type { ParameterDescriptor } from '../../domain/types/ParameterDescriptor';
import { isClassType, isPrimitiveKind } from '../../domain/types/TypeRef';
import { acceptsType, coerce } from '../binding/ParamType';
import type { ValueObjectInstantiator } from '../binding/ValueObjectInstantiator';
import {
  DEFAULT_ATTRIBUTE_KEYS,
  UNRESOLVED,
  isRecord,
  resolved,
  type ArgumentContext,
  type IArgumentValueResolver,
  type Resolution,
} from './IArgumentValueResolver';

export const URI_VAR_RESOLVER_PRIORITY = 150;

export class UriVarValueResolver implements IArgumentValueResolver {
  constructor(
    private readonly instantiator: ValueObjectInstantiator,
    private readonly routeParamsKey: string = DEFAULT_ATTRIBUTE_KEYS.routeParams,
  ) {}

  resolve(parameter: ParameterDescriptor, { request }: ArgumentContext): Resolution {
    const raw = this.lookup(parameter, request);
    if (!raw.resolved || parameter.types.length === 0) {
      return UNRESOLVED;
    }
    const { value } = raw;

    if ((value === null || value === undefined) && parameter.nullable) {
      return resolved(null);
    }

    const [only, ...rest] = parameter.types;
    if (only !== undefined && rest.length === 0 && isPrimitiveKind(only)) {
      return resolved(coerce(only, value));
    }

    const classes = parameter.types.filter(isClassType);
    const primitives = parameter.types.filter(isPrimitiveKind);

    if (primitives.some((kind) => acceptsType(kind, value, true))) {
      return resolved(value);
    }

    const [target, ...otherClasses] = classes;
    if (target === undefined || otherClasses.length > 0) {
      return UNRESOLVED;
    }
    if (value instanceof target) {
      return resolved(value);
    }

    return resolved(this.instantiator.instantiate(target, value));
  }

  /**
   * Find the raw value. A binding tag reads the route parameters, then the
   * carrier attributes; name matching reads the route parameters only.
   */
  private lookup(parameter: ParameterDescriptor, request: InvocationRequest): Resolution {
    const routeParams = request.attributes.get(this.routeParamsKey);
    const params = isRecord(routeParams) ? routeParams : {};

    const key = parameter.bindingTag ?? parameter.name;
    if (Object.hasOwn(params, key)) {
      return resolved(params[key]);
    }
    if (parameter.bindingTag !== undefined && request.attributes.has(key)) {
      return resolved(request.attributes.get(key));
    }
    return UNRESOLVED;
  }
}
