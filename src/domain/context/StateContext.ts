/**
 * state-invoker - State Context
 *
 * Arguments the hosting framework passes to processors and providers next to
 * the operation.
 *
 * @module domain/context/StateContext
 */

/**
 * Raw values extracted from the URI by the routing layer
 */
export type UriVariables = Readonly<Record<string, unknown>>;

/**
 * Framework context. The dynamic path requires `request` to be an
 * {@link InvocationRequest}; other keys are passed through untouched.
 */
export interface StateContext {
  readonly request?: unknown;
  readonly [key: string]: unknown;
}
