/**
 * state-invoker - Operation Metadata
 *
 * Describes the operation matched for a request: the HTTP verb, the URI
 * template and the identifiers of the processor and provider configured for
 * it. The dispatch decorators read the identifiers; invokable handlers may
 * declare an `Operation` parameter to receive the instance itself.
 *
 * @module domain/operation/Operation
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Operation configuration
 */
export interface OperationOptions {
  /** Operation name, e.g. `user_get` */
  name?: string;

  /** URI template, e.g. `/companies/{companyId}/users/{userId}` */
  uriTemplate?: string;

  /** Identifier of the write handler registered for this operation */
  processor?: string;

  /** Identifier of the read handler registered for this operation */
  provider?: string;

  /** Free-form metadata for application code */
  extra?: Record<string, unknown>;
}

/**
 * Base operation class. Use the verb-specific subclasses below.
 *
 * @example
 * ```typescript
 * const operation = new Post({
 *   uriTemplate: '/companies/{companyId}/users',
 *   processor: 'app.create_user',
 * });
 * ```
 */
export class Operation {
  readonly name?: string;
  readonly uriTemplate?: string;
  readonly processor?: string;
  readonly provider?: string;
  readonly extra: Readonly<Record<string, unknown>>;

  constructor(
    readonly method: HttpMethod,
    options: OperationOptions = {},
  ) {
    this.name = options.name;
    this.uriTemplate = options.uriTemplate;
    this.processor = options.processor;
    this.provider = options.provider;
    this.extra = Object.freeze({ ...options.extra });
  }

  /** Whether the operation returns a collection */
  get isCollection(): boolean {
    return false;
  }
}

export class Get extends Operation {
  constructor(options: OperationOptions = {}) {
    super('GET', options);
  }
}

export class GetCollection extends Operation {
  constructor(options: OperationOptions = {}) {
    super('GET', options);
  }

  get isCollection(): boolean {
    return true;
  }
}

export class Post extends Operation {
  constructor(options: OperationOptions = {}) {
    super('POST', options);
  }
}

export class Put extends Operation {
  constructor(options: OperationOptions = {}) {
    super('PUT', options);
  }
}

export class Patch extends Operation {
  constructor(options: OperationOptions = {}) {
    super('PATCH', options);
  }
}

export class Delete extends Operation {
  constructor(options: OperationOptions = {}) {
    super('DELETE', options);
  }
}
