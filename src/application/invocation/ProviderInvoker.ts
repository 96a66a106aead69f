/**
 * state-invoker - Provider Invoker
 *
 * @module application/invocation/ProviderInvoker
 */

import type { StateContext, UriVariables } from '../../domain/context/StateContext';
import { InvalidResultShapeError, describeValue } from '../../domain/exceptions/exceptions';
import type { Operation } from '../../domain/operation/Operation';
import type { InvokableHandler } from '../binding/invokable';
import { InvocationBridge, type HandlerRole } from './InvocationBridge';

/**
 * Calls a read handler through the dynamic path. The handler returns an
 * object, an array or other iterable object, or nothing (`null`/`undefined`,
 * normalised to `null`).
 */
export class ProviderInvoker extends InvocationBridge {
  protected readonly role: HandlerRole = 'provider';

  /**
   * @throws {MissingCarrierError} no carrier in `context.request`
   * @throws {InvalidResultShapeError} the handler returned a primitive
   */
  async invoke(
    handler: InvokableHandler,
    operation: Operation,
    uriVariables: UriVariables = {},
    context: StateContext = {},
  ): Promise<object | null> {
    const result = await this.call(handler, undefined, operation, uriVariables, context);

    if (result === null || result === undefined) {
      return null;
    }
    if (typeof result !== 'object') {
      throw new InvalidResultShapeError('provider', describeValue(result));
    }
    return result;
  }
}
