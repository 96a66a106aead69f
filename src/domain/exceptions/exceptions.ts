/**
 * state-invoker - Exceptions
 *
 * Configuration and programming errors raised on the dynamic invocation
 * path. None of them is retried; they surface to the caller of the bridge.
 * The conventional (fixed-interface) path never raises them.
 */

/**
 * Base class for every error raised by the engine
 */
export class InvokerException extends Error {
  constructor(
    message: string,
    public readonly details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = 'InvokerException';
    Error.captureStackTrace(this, this.constructor);
  }
}

// ==================== Construction ====================

/**
 * The method named by `@ConstructWith` is missing, not static, not public or
 * does not take exactly one required parameter.
 */
export class InvalidTaggedStrategyError extends InvokerException {
  constructor(
    public readonly typeName: string,
    public readonly method: string,
    public readonly reason: string,
  ) {
    super(`Invalid @ConstructWith on ${typeName}.${method}(): ${reason}.`, {
      type: typeName,
      method,
      reason,
    });
    this.name = 'InvalidTaggedStrategyError';
  }
}

/**
 * The raw value does not satisfy the parameter of the `@ConstructWith` method.
 */
export class RejectedValueError extends InvokerException {
  constructor(
    public readonly typeName: string,
    public readonly method: string,
    public readonly value: unknown,
  ) {
    super(`Value not accepted by ${typeName}.${method}().`, {
      type: typeName,
      method,
      value,
    });
    this.name = 'RejectedValueError';
  }
}

/**
 * No constructor or static factory of an untagged type accepts the raw value.
 */
export class NoConstructionStrategyError extends InvokerException {
  constructor(public readonly typeName: string) {
    super(`No usable constructor/factory for ${typeName}.`, { type: typeName });
    this.name = 'NoConstructionStrategyError';
  }
}

/**
 * More than one constructor or static factory of an untagged type accepts the
 * raw value.
 */
export class AmbiguousConstructionError extends InvokerException {
  constructor(
    public readonly typeName: string,
    public readonly candidates: readonly string[],
  ) {
    super(
      `Ambiguous factories for ${typeName} (${candidates.join(', ')}); ` +
        'add @ConstructWith(...) to disambiguate.',
      { type: typeName, candidates },
    );
    this.name = 'AmbiguousConstructionError';
  }
}

/**
 * A constructor or factory produced something other than an instance of the
 * exact requested type.
 */
export class ConstructionResultError extends InvokerException {
  constructor(
    public readonly typeName: string,
    public readonly strategy: string,
  ) {
    super(`${typeName}.${strategy} did not return an instance of ${typeName}.`, {
      type: typeName,
      strategy,
    });
    this.name = 'ConstructionResultError';
  }
}

// ==================== Signatures & Arguments ====================

/**
 * A handler signature declares the same parameter name twice, or a
 * variadic parameter that is not the last one.
 */
export class InvalidSignatureError extends InvokerException {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSignatureError';
  }
}

/**
 * No resolver produced a value for a required handler parameter.
 */
export class UnresolvedArgumentError extends InvokerException {
  constructor(
    public readonly handlerName: string,
    public readonly parameter: string,
  ) {
    super(
      `${handlerName} requires that you provide a value for the "${parameter}" argument. ` +
        'Either the argument is nullable and no null value has been provided, ' +
        'no default value has been provided or there is a non-optional argument after this one.',
      { handler: handlerName, parameter },
    );
    this.name = 'UnresolvedArgumentError';
  }
}

// ==================== Invocation ====================

/**
 * The dynamic path was reached without a request carrier in the context.
 */
export class MissingCarrierError extends InvokerException {
  constructor(public readonly role: 'processor' | 'provider') {
    super(
      `No request in context; invokable ${role}s are request-only. ` +
        'Ensure the framework passes the request as context.request.',
      { role },
    );
    this.name = 'MissingCarrierError';
  }
}

/**
 * A handler returned a value outside the shape allowed for its role.
 */
export class InvalidResultShapeError extends InvokerException {
  constructor(
    public readonly role: 'processor' | 'provider',
    public readonly received: string,
  ) {
    super(
      role === 'processor'
        ? `Processor must return an object (DTO/Resource), got ${received}.`
        : `Provider must return an object or iterable (or null), got ${received}.`,
      { role, received },
    );
    this.name = 'InvalidResultShapeError';
  }
}

/**
 * Describe a runtime value for error messages: `null`, `array`, the class
 * name of objects, or the `typeof` of primitives.
 */
export function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'object') {
    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype !== null && typeof prototype === 'object' && 'constructor' in prototype) {
      const ctor: unknown = prototype.constructor;
      if (typeof ctor === 'function' && ctor.name) {
        return ctor.name;
      }
    }
    return 'object';
  }
  return typeof value;
}
