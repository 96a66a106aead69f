/**
 * state-invoker - Argument Resolver
 *
 * Runs the resolver chain over a handler signature and produces the argument
 * list for one call.
 *
 * @module application/resolvers/ArgumentResolver
 */

import type { InvocationRequest } from '../../domain/context/InvocationRequest';
import { UnresolvedArgumentError } from '../../domain/exceptions/exceptions';
import { silentLogger, type ILogger } from '../../infrastructure/logging/logger';
import { getInvokableSignature, handlerName, type InvokableHandler } from '../binding/invokable';
import type { ParameterDescriptor } from '../../domain/types/ParameterDescriptor';
import { UNRESOLVED, type ArgumentContext, type IArgumentValueResolver, type Resolution } from './IArgumentValueResolver';

/**
 * A resolver with its position in the chain. Higher priorities run first;
 * equal priorities keep registration order.
 */
export interface PrioritizedResolver {
  readonly resolver: IArgumentValueResolver;
  readonly priority: number;
}

/**
 * @example
 * ```typescript
 * const resolver = new ArgumentResolver()
 *   .addResolver(new UriVarValueResolver(new ValueObjectInstantiator()), 150)
 *   .addResolver(new PayloadValueResolver())
 *   .addResolver(new DefaultValueResolver(), -100);
 *
 * const args = resolver.getArguments(request, createUser, input);
 * ```
 */
export class ArgumentResolver {
  private readonly entries: PrioritizedResolver[] = [];
  private ordered: readonly IArgumentValueResolver[] = [];

  constructor(
    resolvers: Iterable<PrioritizedResolver> = [],
    private readonly logger: ILogger = silentLogger,
  ) {
    for (const { resolver, priority } of resolvers) {
      this.addResolver(resolver, priority);
    }
  }

  addResolver(resolver: IArgumentValueResolver, priority = 0): this {
    this.entries.push({ resolver, priority });
    // Array.prototype.sort is stable
    this.ordered = [...this.entries].sort((a, b) => b.priority - a.priority).map((entry) => entry.resolver);
    return this;
  }

  /**
   * Resolvers in the order they are consulted
   */
  get resolvers(): readonly IArgumentValueResolver[] {
    return this.ordered;
  }

  /**
   * Resolve every declared parameter of `handler`, in declaration order.
   *
   * Variadic parameters spread an array value and contribute nothing when
   * unresolved. Handlers without a signature receive no arguments.
   *
   * @throws {UnresolvedArgumentError} a non-variadic parameter resolved to nothing
   */
  getArguments(request: InvocationRequest, handler: InvokableHandler, payload?: unknown): unknown[] {
    const signature = getInvokableSignature(handler);
    const name = handlerName(handler);
    if (!signature) {
      this.logger.debug(`No signature declared for ${name}; calling without arguments`);
      return [];
    }

    const context: ArgumentContext = { request, payload, handler: name };
    const args: unknown[] = [];

    for (const parameter of signature) {
      const resolution = this.resolveOne(parameter, context);

      if (parameter.variadic) {
        if (resolution.resolved) {
          args.push(...(Array.isArray(resolution.value) ? resolution.value : [resolution.value]));
        }
        continue;
      }

      if (!resolution.resolved) {
        throw new UnresolvedArgumentError(name, parameter.name);
      }
      args.push(resolution.value);
    }

    return args;
  }

  private resolveOne(parameter: ParameterDescriptor, context: ArgumentContext): Resolution {
    for (const resolver of this.ordered) {
      const resolution = resolver.resolve(parameter, context);
      if (resolution.resolved) {
        return resolution;
      }
    }
    return UNRESOLVED;
  }
}
