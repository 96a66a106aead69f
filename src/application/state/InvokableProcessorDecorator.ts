/**
 * state-invoker - Invokable Processor Decorator
 *
 * @module application/state/InvokableProcessorDecorator
 */

import type { StateContext, UriVariables } from '../../domain/context/StateContext';
import type { Operation } from '../../domain/operation/Operation';
import { silentLogger, type ILogger } from '../../infrastructure/logging/logger';
import type { IHandlerRegistry } from '../di/IHandlerRegistry';
import type { ProcessorInvoker } from '../invocation/ProcessorInvoker';
import { classifyHandler } from './classifyHandler';
import type { IStateProcessor } from './IStateProcessor';

/**
 * Wraps the framework's processor. When the operation's processor identifier
 * resolves to a plain function in the registry, the call goes through the
 * {@link ProcessorInvoker}; otherwise the wrapped processor receives the
 * original arguments.
 */
export class InvokableProcessorDecorator implements IStateProcessor {
  constructor(
    private readonly inner: IStateProcessor,
    private readonly registry: IHandlerRegistry,
    private readonly invoker: ProcessorInvoker,
    private readonly logger: ILogger = silentLogger,
  ) {}

  async process(data: unknown, operation: Operation, uriVariables?: UriVariables, context?: StateContext): Promise<unknown> {
    const id = operation.processor;
    if (id === undefined || !this.registry.has(id)) {
      this.logger.debug(`Processor ${id ?? '(none)'} not registered; delegating`);
      return this.inner.process(data, operation, uriVariables, context);
    }

    const handler = classifyHandler(this.registry.get(id), 'processor');
    if (handler.kind === 'dynamic') {
      this.logger.debug(`Processor ${id} dispatched through the dynamic path`);
      return this.invoker.invoke(handler.handler, data, operation, uriVariables, context);
    }

    this.logger.debug(`Processor ${id} takes the conventional path; delegating`);
    return this.inner.process(data, operation, uriVariables, context);
  }
}
