/**
 * state-invoker - Invocation Bridge
 *
 * Shared steps of a dynamic invocation: validate the carrier, propagate raw
 * named values and the operation into its attributes, resolve arguments and
 * await the handler.
 *
 * @module application/invocation/InvocationBridge
 */

import { isInvocationRequest, type InvocationRequest } from '../../domain/context/InvocationRequest';
import type { StateContext, UriVariables } from '../../domain/context/StateContext';
import { MissingCarrierError } from '../../domain/exceptions/exceptions';
import type { Operation } from '../../domain/operation/Operation';
import { silentLogger, type ILogger } from '../../infrastructure/logging/logger';
import { handlerName, type InvokableHandler } from '../binding/invokable';
import type { ArgumentResolver } from '../resolvers/ArgumentResolver';
import { DEFAULT_ATTRIBUTE_KEYS, isRecord, type AttributeKeys } from '../resolvers/IArgumentValueResolver';

export type HandlerRole = 'processor' | 'provider';

export interface InvocationBridgeOptions {
  attributeKeys?: AttributeKeys;
  logger?: ILogger;
}

export abstract class InvocationBridge {
  protected abstract readonly role: HandlerRole;

  protected readonly attributeKeys: AttributeKeys;
  protected readonly logger: ILogger;

  constructor(
    protected readonly argumentResolver: ArgumentResolver,
    options: InvocationBridgeOptions = {},
  ) {
    this.attributeKeys = options.attributeKeys ?? DEFAULT_ATTRIBUTE_KEYS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run the handler and return its awaited, unvalidated result.
   *
   * @throws {MissingCarrierError} `context.request` is not a carrier
   */
  protected async call(
    handler: InvokableHandler,
    payload: unknown,
    operation: Operation,
    uriVariables: UriVariables,
    context: StateContext,
  ): Promise<unknown> {
    const { request } = context;
    if (!isInvocationRequest(request)) {
      throw new MissingCarrierError(this.role);
    }

    this.propagate(request, operation, uriVariables);

    const args = this.argumentResolver.getArguments(request, handler, payload);
    this.logger.debug(`Invoking ${this.role} ${handlerName(handler)}`, {
      operation: operation.name,
      arguments: args.length,
    });

    const result: unknown = await Reflect.apply(handler, undefined, args);
    return result;
  }

  /**
   * Write-once copy of the raw named values into the attributes, then
   * `route-params` (URI variables win over earlier entries) and `operation`.
   */
  private propagate(request: InvocationRequest, operation: Operation, uriVariables: UriVariables): void {
    const { attributes } = request;

    for (const [key, value] of Object.entries(uriVariables)) {
      attributes.setIfAbsent(key, value);
    }

    const existing = attributes.get(this.attributeKeys.routeParams);
    attributes.set(this.attributeKeys.routeParams, {
      ...(isRecord(existing) ? existing : {}),
      ...uriVariables,
    });
    attributes.set(this.attributeKeys.operation, operation);
  }
}
