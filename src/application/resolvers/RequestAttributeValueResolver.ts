/**
 * state-invoker - Request Attribute Value Resolver
 *
 * Supplies a carrier attribute to the parameter of the same name when the
 * attribute value satisfies the declared type, coerced to a single declared
 * primitive kind.
 *
 * @module application/resolvers/RequestAttributeValueResolver
 */

import type { ParameterDescriptor } from '../../domain/types/ParameterDescriptor';
import { accepts, narrow } from '../binding/ParamType';
import { UNRESOLVED, resolved, type ArgumentContext, type IArgumentValueResolver, type Resolution } from './IArgumentValueResolver';

export class RequestAttributeValueResolver implements IArgumentValueResolver {
  resolve(parameter: ParameterDescriptor, { request }: ArgumentContext): Resolution {
    if (parameter.variadic || !request.attributes.has(parameter.name)) {
      return UNRESOLVED;
    }

    const value = request.attributes.get(parameter.name);
    return accepts(parameter, value) ? resolved(narrow(parameter, value)) : UNRESOLVED;
  }
}
