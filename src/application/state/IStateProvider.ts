/**
 * state-invoker - State Provider Contract
 *
 * @module application/state/IStateProvider
 */

import type { StateContext, UriVariables } from '../../domain/context/StateContext';
import type { Operation } from '../../domain/operation/Operation';

/**
 * Fixed-signature read handler (conventional path).
 *
 * @template TOutput - Returned item or collection
 */
export interface IStateProvider<TOutput = unknown> {
  provide(operation: Operation, uriVariables?: UriVariables, context?: StateContext): Promise<TOutput>;
}

export function isStateProvider(value: unknown): value is IStateProvider {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
    return false;
  }
  return 'provide' in value && typeof value.provide === 'function';
}
