/**
 * state-invoker - Processor Invoker
 *
 * @module application/invocation/ProcessorInvoker
 */

import type { StateContext, UriVariables } from '../../domain/context/StateContext';
import { InvalidResultShapeError, describeValue } from '../../domain/exceptions/exceptions';
import type { Operation } from '../../domain/operation/Operation';
import type { InvokableHandler } from '../binding/invokable';
import { InvocationBridge, type HandlerRole } from './InvocationBridge';

/**
 * Calls a write handler through the dynamic path. The handler must return an
 * object (DTO or resource); arrays, primitives and `null` are rejected.
 *
 * @example
 * ```typescript
 * const invoker = new ProcessorInvoker(argumentResolver);
 * const user = await invoker.invoke(createUser, input, operation, { companyId: 'acme-corp' }, { request });
 * ```
 */
export class ProcessorInvoker extends InvocationBridge {
  protected readonly role: HandlerRole = 'processor';

  /**
   * @throws {MissingCarrierError} no carrier in `context.request`
   * @throws {InvalidResultShapeError} the handler returned a non-object
   */
  async invoke(
    handler: InvokableHandler,
    data: unknown,
    operation: Operation,
    uriVariables: UriVariables = {},
    context: StateContext = {},
  ): Promise<object> {
    const result = await this.call(handler, data, operation, uriVariables, context);

    if (typeof result !== 'object' || result === null || Array.isArray(result)) {
      throw new InvalidResultShapeError('processor', describeValue(result));
    }
    return result;
  }
}
