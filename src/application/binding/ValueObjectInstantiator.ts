/**
 * state-invoker - Value Object Instantiator
 *
 * Builds a typed value object from one raw value.
 *
 * Strategy selection:
 * 1. A class tagged with `@ConstructWith(method)` is built only through that
 *    method. The method must exist, be static, public and take exactly one
 *    required parameter, and its parameter must accept the value.
 * 2. Otherwise every public constructor or `@Factory` static method returning
 *    exactly the class, taking exactly one required parameter that accepts
 *    the value, is a candidate. One candidate is used; none or several is an
 *    error. There is no tie-break.
 *
 * @module application/binding/ValueObjectInstantiator
 */

import {
  AmbiguousConstructionError,
  ConstructionResultError,
  InvalidTaggedStrategyError,
  NoConstructionStrategyError,
  RejectedValueError,
} from '../../domain/exceptions/exceptions';
import type { ClassType } from '../../domain/types/TypeRef';
import { accepts, narrow } from './ParamType';
import { TypeIntrospector, type MethodDescriptor, type TypeDescriptor } from './TypeIntrospector';

export class ValueObjectInstantiator {
  constructor(private readonly introspector: TypeIntrospector = new TypeIntrospector()) {}

  /**
   * Build an instance of `type` from a raw value.
   *
   * @throws {InvalidTaggedStrategyError} tagged method unusable
   * @throws {RejectedValueError} tagged method does not accept the value
   * @throws {NoConstructionStrategyError} no candidate accepts the value
   * @throws {AmbiguousConstructionError} several candidates accept the value
   * @throws {ConstructionResultError} the strategy returned a foreign value
   *
   * @example
   * ```typescript
   * const instantiator = new ValueObjectInstantiator();
   * const companyId = instantiator.instantiate(CompanyId, 'acme-corp');
   * companyId.toString(); // 'acme-corp'
   * ```
   */
  instantiate<T>(type: ClassType<T>, value: unknown): T {
    const descriptor = this.introspector.describe(type);

    const strategy =
      descriptor.constructWith !== undefined
        ? this.taggedStrategy(descriptor, descriptor.constructWith, value)
        : this.soleCandidate(descriptor, value);

    const result = strategy.invoke(narrow(strategy.parameter, value));
    if (!(result instanceof type) || Object.getPrototypeOf(result) !== type.prototype) {
      throw new ConstructionResultError(descriptor.name, strategy.name);
    }
    return result;
  }

  private taggedStrategy(descriptor: TypeDescriptor, method: string, value: unknown): MethodDescriptor {
    const invalid = (reason: string) => new InvalidTaggedStrategyError(descriptor.name, method, reason);

    const strategy = descriptor.staticMethods.get(method);
    if (!strategy) {
      throw invalid(descriptor.instanceMethodNames.has(method) ? 'is not static' : 'does not exist');
    }
    if (!strategy.isPublic) {
      throw invalid('is not public');
    }
    if (strategy.requiredParameters !== 1) {
      throw invalid('must take exactly one required parameter');
    }
    if (!accepts(strategy.parameter, value)) {
      throw new RejectedValueError(descriptor.name, method, value);
    }
    return strategy;
  }

  private soleCandidate(descriptor: TypeDescriptor, value: unknown): MethodDescriptor {
    const candidates = this.candidates(descriptor).filter((candidate) => accepts(candidate.parameter, value));

    const [only, ...others] = candidates;
    if (only === undefined) {
      throw new NoConstructionStrategyError(descriptor.name);
    }
    if (others.length > 0) {
      throw new AmbiguousConstructionError(
        descriptor.name,
        candidates.map((candidate) => candidate.name),
      );
    }
    return only;
  }

  /**
   * Constructor first, then static factories in declaration order
   */
  private candidates(descriptor: TypeDescriptor): MethodDescriptor[] {
    const eligible = (method: MethodDescriptor): boolean =>
      method.isPublic && method.requiredParameters === 1 && method.returnType === descriptor.type;

    return [descriptor.initializer, ...descriptor.staticMethods.values()].filter(eligible);
  }
}
