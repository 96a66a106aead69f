/**
 * state-invoker - Invocation Request
 *
 * The request-like carrier threaded through a dynamic invocation. It belongs
 * to the hosting framework; the engine only reads and writes its attributes.
 *
 * @module domain/context/InvocationRequest
 */

import { AttributeBag } from './AttributeBag';

/**
 * Request construction options
 */
export interface InvocationRequestInit {
  /** HTTP method or operation type */
  method?: string;

  /** Request path */
  path?: string;

  /** Request headers */
  headers?: Record<string, string | string[] | undefined>;

  /** Attributes placed by the routing layer */
  attributes?: Record<string, unknown>;
}

/**
 * @example
 * ```typescript
 * const request = new InvocationRequest({
 *   method: 'POST',
 *   path: '/companies/acme-corp/users',
 *   attributes: { companyId: 'acme-corp' },
 * });
 *
 * await processor.process(input, operation, { companyId: 'acme-corp' }, { request });
 * ```
 */
export class InvocationRequest {
  readonly method: string;
  readonly path: string;
  readonly headers: Readonly<Record<string, string | string[] | undefined>>;
  readonly attributes: AttributeBag;

  constructor(init: InvocationRequestInit = {}) {
    this.method = init.method ?? 'GET';
    this.path = init.path ?? '/';
    this.headers = Object.freeze({ ...init.headers });
    this.attributes = new AttributeBag(init.attributes);
  }
}

/**
 * Type guard for the carrier
 */
export function isInvocationRequest(value: unknown): value is InvocationRequest {
  return value instanceof InvocationRequest;
}
