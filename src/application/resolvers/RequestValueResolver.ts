/**
 * state-invoker - Request Value Resolver
 *
 * Supplies the carrier itself to parameters typed as {@link InvocationRequest}.
 *
 * @module application/resolvers/RequestValueResolver
 */

import { InvocationRequest } from '../../domain/context/InvocationRequest';
import type { ParameterDescriptor } from '../../domain/types/ParameterDescriptor';
import { isClassType, isSubclassOf } from '../../domain/types/TypeRef';
import { UNRESOLVED, resolved, type ArgumentContext, type IArgumentValueResolver, type Resolution } from './IArgumentValueResolver';

export class RequestValueResolver implements IArgumentValueResolver {
  resolve(parameter: ParameterDescriptor, { request }: ArgumentContext): Resolution {
    const matches = parameter.types.some(
      (type) => isSubclassOf(type, InvocationRequest) && isClassType(type) && request instanceof type,
    );
    return matches ? resolved(request) : UNRESOLVED;
  }
}
