/**
 * state-invoker - Payload Value Resolver
 *
 * Supplies the input of a write call to the parameter named after one of the
 * payload aliases, or to a parameter whose declared class the payload is an
 * instance of.
 *
 * @module application/resolvers/PayloadValueResolver
 */

import type { ParameterDescriptor } from '../../domain/types/ParameterDescriptor';
import { isClassType } from '../../domain/types/TypeRef';
import { UNRESOLVED, resolved, type ArgumentContext, type IArgumentValueResolver, type Resolution } from './IArgumentValueResolver';

export const DEFAULT_PAYLOAD_ALIASES: readonly string[] = Object.freeze(['data', 'input']);

export class PayloadValueResolver implements IArgumentValueResolver {
  private readonly aliases: ReadonlySet<string>;

  constructor(aliases: readonly string[] = DEFAULT_PAYLOAD_ALIASES) {
    this.aliases = new Set(aliases);
  }

  resolve(parameter: ParameterDescriptor, { payload }: ArgumentContext): Resolution {
    if (payload === null || payload === undefined) {
      return UNRESOLVED;
    }

    if (this.aliases.has(parameter.name)) {
      return resolved(payload);
    }

    const matchesType = parameter.types.some((type) => isClassType(type) && payload instanceof type);
    return matchesType ? resolved(payload) : UNRESOLVED;
  }
}
