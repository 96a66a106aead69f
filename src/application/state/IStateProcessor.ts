/**
 * state-invoker - State Processor Contract
 *
 * @module application/state/IStateProcessor
 */

import type { StateContext, UriVariables } from '../../domain/context/StateContext';
import type { Operation } from '../../domain/operation/Operation';

/**
 * Fixed-signature write handler (conventional path).
 *
 * @template TInput - Input payload type
 * @template TOutput - Result type
 *
 * @example
 * ```typescript
 * class PersistUserProcessor implements IStateProcessor<UserResource, UserResource> {
 *   async process(data: UserResource, operation: Operation): Promise<UserResource> {
 *     return this.repository.save(data);
 *   }
 * }
 * ```
 */
export interface IStateProcessor<TInput = unknown, TOutput = unknown> {
  process(data: TInput, operation: Operation, uriVariables?: UriVariables, context?: StateContext): Promise<TOutput>;
}

export function isStateProcessor(value: unknown): value is IStateProcessor {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
    return false;
  }
  return 'process' in value && typeof value.process === 'function';
}
