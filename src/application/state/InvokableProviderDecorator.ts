/**
 * state-invoker - Invokable Provider Decorator
 *
 * @module application/state/InvokableProviderDecorator
 */

import type { StateContext, UriVariables } from '../../domain/context/StateContext';
import type { Operation } from '../../domain/operation/Operation';
import { silentLogger, type ILogger } from '../../infrastructure/logging/logger';
import type { IHandlerRegistry } from '../di/IHandlerRegistry';
import type { ProviderInvoker } from '../invocation/ProviderInvoker';
import { classifyHandler } from './classifyHandler';
import type { IStateProvider } from './IStateProvider';

/**
 * Read-side counterpart of {@link InvokableProcessorDecorator}, keyed by
 * `operation.provider`.
 */
export class InvokableProviderDecorator implements IStateProvider {
  constructor(
    private readonly inner: IStateProvider,
    private readonly registry: IHandlerRegistry,
    private readonly invoker: ProviderInvoker,
    private readonly logger: ILogger = silentLogger,
  ) {}

  async provide(operation: Operation, uriVariables?: UriVariables, context?: StateContext): Promise<unknown> {
    const id = operation.provider;
    if (id === undefined || !this.registry.has(id)) {
      this.logger.debug(`Provider ${id ?? '(none)'} not registered; delegating`);
      return this.inner.provide(operation, uriVariables, context);
    }

    const handler = classifyHandler(this.registry.get(id), 'provider');
    if (handler.kind === 'dynamic') {
      this.logger.debug(`Provider ${id} dispatched through the dynamic path`);
      return this.invoker.invoke(handler.handler, operation, uriVariables, context);
    }

    this.logger.debug(`Provider ${id} takes the conventional path; delegating`);
    return this.inner.provide(operation, uriVariables, context);
  }
}
