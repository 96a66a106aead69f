/**
 * state-invoker - Invoker
 *
 * Composition root: builds the introspector, the construction resolver, the
 * resolver chain and both bridges from one set of options, and wraps the
 * framework's processor and provider with the dispatch decorators.
 *
 * @module application/host/invoker
 */

import type { ILogger, LogLevel } from '../../infrastructure/logging/logger';
import { TypeIntrospector } from '../binding/TypeIntrospector';
import { ValueObjectInstantiator } from '../binding/ValueObjectInstantiator';
import type { IHandlerRegistry } from '../di/IHandlerRegistry';
import { ProcessorInvoker } from '../invocation/ProcessorInvoker';
import { ProviderInvoker } from '../invocation/ProviderInvoker';
import { ArgumentResolver } from '../resolvers/ArgumentResolver';
import { DefaultValueResolver } from '../resolvers/DefaultValueResolver';
import type { AttributeKeys, IArgumentValueResolver } from '../resolvers/IArgumentValueResolver';
import { OperationValueResolver } from '../resolvers/OperationValueResolver';
import { PayloadValueResolver } from '../resolvers/PayloadValueResolver';
import { RequestAttributeValueResolver } from '../resolvers/RequestAttributeValueResolver';
import { RequestValueResolver } from '../resolvers/RequestValueResolver';
import { UriVarValueResolver } from '../resolvers/UriVarValueResolver';
import type { IStateProcessor } from '../state/IStateProcessor';
import type { IStateProvider } from '../state/IStateProvider';
import { InvokableProcessorDecorator } from '../state/InvokableProcessorDecorator';
import { InvokableProviderDecorator } from '../state/InvokableProviderDecorator';
import { resolveInvokerOptions, type InvokerOptions, type ResolvedInvokerOptions } from './options';

/**
 * StateInvoker - the assembled engine
 *
 * @example
 * ```typescript
 * const handlers = new HandlerContainer()
 *   .register('app.create_user', createUser)
 *   .register('app.get_user', getUser);
 *
 * const invoker = createInvoker({ logLevel: 'debug' });
 * const processor = invoker.decorateProcessor(persistProcessor, handlers);
 * const provider = invoker.decorateProvider(itemProvider, handlers);
 *
 * const user = await processor.process(input, operation, { companyId: 'acme-corp' }, { request });
 * ```
 */
export class StateInvoker {
  readonly options: ResolvedInvokerOptions;
  readonly introspector: TypeIntrospector;
  readonly instantiator: ValueObjectInstantiator;
  readonly argumentResolver: ArgumentResolver;
  readonly processorInvoker: ProcessorInvoker;
  readonly providerInvoker: ProviderInvoker;

  private constructor(options: ResolvedInvokerOptions) {
    this.options = options;
    const { logger, attributeKeys } = options;

    this.introspector = new TypeIntrospector(options.typeCacheCapacity);
    this.instantiator = new ValueObjectInstantiator(this.introspector);

    this.argumentResolver = new ArgumentResolver(
      [
        {
          resolver: new UriVarValueResolver(this.instantiator, attributeKeys.routeParams),
          priority: options.uriVarResolverPriority,
        },
        { resolver: new RequestAttributeValueResolver(), priority: 100 },
        { resolver: new RequestValueResolver(), priority: 50 },
        { resolver: new PayloadValueResolver(options.payloadAliases), priority: 0 },
        { resolver: new OperationValueResolver(attributeKeys.operation), priority: 0 },
        { resolver: new DefaultValueResolver(), priority: -100 },
        ...options.resolvers.map(({ resolver, priority }) => ({ resolver, priority: priority ?? 0 })),
      ],
      logger,
    );

    this.processorInvoker = new ProcessorInvoker(this.argumentResolver, { attributeKeys, logger });
    this.providerInvoker = new ProviderInvoker(this.argumentResolver, { attributeKeys, logger });
  }

  /**
   * Create an invoker
   */
  static create(options?: InvokerOptions): StateInvoker {
    return new StateInvoker(resolveInvokerOptions(options));
  }

  get logger(): ILogger {
    return this.options.logger;
  }

  /**
   * Wrap the framework's processor so that registered plain functions are
   * called through the dynamic path
   */
  decorateProcessor(inner: IStateProcessor, registry: IHandlerRegistry): InvokableProcessorDecorator {
    return new InvokableProcessorDecorator(inner, registry, this.processorInvoker, this.logger);
  }

  /**
   * Wrap the framework's provider so that registered plain functions are
   * called through the dynamic path
   */
  decorateProvider(inner: IStateProvider, registry: IHandlerRegistry): InvokableProviderDecorator {
    return new InvokableProviderDecorator(inner, registry, this.providerInvoker, this.logger);
  }
}

/**
 * InvokerBuilder - fluent configuration of a {@link StateInvoker}
 *
 * @example
 * ```typescript
 * const invoker = createInvokerBuilder()
 *   .withLogLevel('debug')
 *   .withPayloadAliases(['data', 'input', 'body'])
 *   .addResolver(new TenantResolver(), 120)
 *   .build();
 * ```
 */
export class InvokerBuilder {
  private options: InvokerOptions = {};
  private resolvers: Array<{ resolver: IArgumentValueResolver; priority: number }> = [];

  /**
   * Set logger
   */
  withLogger(logger: ILogger): this {
    this.options.logger = logger;
    return this;
  }

  /**
   * Set the default console logger threshold
   */
  withLogLevel(level: LogLevel): this {
    this.options.logLevel = level;
    return this;
  }

  withPayloadAliases(aliases: readonly string[]): this {
    this.options.payloadAliases = [...aliases];
    return this;
  }

  withAttributeKeys(keys: Partial<AttributeKeys>): this {
    this.options.attributeKeys = { ...this.options.attributeKeys, ...keys };
    return this;
  }

  withTypeCacheCapacity(capacity: number): this {
    this.options.typeCacheCapacity = capacity;
    return this;
  }

  withUriVarResolverPriority(priority: number): this {
    this.options.uriVarResolverPriority = priority;
    return this;
  }

  /**
   * Add a resolver to the chain
   */
  addResolver(resolver: IArgumentValueResolver, priority = 0): this {
    this.resolvers.push({ resolver, priority });
    return this;
  }

  /**
   * Build the invoker
   */
  build(): StateInvoker {
    return StateInvoker.create({
      ...this.options,
      resolvers: [...this.resolvers],
    });
  }
}

/**
 * Create a new invoker builder
 */
export function createInvokerBuilder(): InvokerBuilder {
  return new InvokerBuilder();
}

/**
 * Quick start helper - creates an invoker in one call
 */
export function createInvoker(options?: InvokerOptions): StateInvoker {
  return StateInvoker.create(options);
}
