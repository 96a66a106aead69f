/**
 * state-invoker - Operation Value Resolver
 *
 * Supplies the matched {@link Operation} to parameters typed as `Operation`
 * or one of its subclasses.
 *
 * @module application/resolvers/OperationValueResolver
 */

import { Operation } from '../../domain/operation/Operation';
import type { ParameterDescriptor } from '../../domain/types/ParameterDescriptor';
import { isClassType, isSubclassOf } from '../../domain/types/TypeRef';
import {
  DEFAULT_ATTRIBUTE_KEYS,
  UNRESOLVED,
  resolved,
  type ArgumentContext,
  type IArgumentValueResolver,
  type Resolution,
} from './IArgumentValueResolver';

export class OperationValueResolver implements IArgumentValueResolver {
  constructor(private readonly operationKey: string = DEFAULT_ATTRIBUTE_KEYS.operation) {}

  resolve(parameter: ParameterDescriptor, { request }: ArgumentContext): Resolution {
    const declared = parameter.types.find((type) => isSubclassOf(type, Operation));
    if (declared === undefined || !isClassType(declared)) {
      return UNRESOLVED;
    }

    const operation = request.attributes.get(this.operationKey);

    if (parameter.nullable && (operation === null || operation === undefined)) {
      return resolved(null);
    }

    if (!(operation instanceof Operation)) {
      return UNRESOLVED;
    }

    if (declared === Operation || operation instanceof declared) {
      return resolved(operation);
    }

    // Declared type is narrower than the matched operation
    return parameter.nullable ? resolved(null) : UNRESOLVED;
  }
}
