/**
 * @fileoverview Unit tests for invoker options and composition
 */

import {
  arg,
  createInvoker,
  createInvokerBuilder,
  DEFAULT_INVOKER_OPTIONS,
  defineInvokable,
  DefaultValueResolver,
  InvocationRequest,
  OperationValueResolver,
  PayloadValueResolver,
  Post,
  RequestAttributeValueResolver,
  RequestValueResolver,
  resolved,
  resolveInvokerOptions,
  StateInvoker,
  UNRESOLVED,
  UriVarValueResolver,
  type IArgumentValueResolver,
  type ILogger,
  type ParameterDescriptor,
  type Resolution,
} from '../../../src';

class TenantResolver implements IArgumentValueResolver {
  resolve(parameter: ParameterDescriptor): Resolution {
    return parameter.name === 'tenant' ? resolved('tenant-a') : UNRESOLVED;
  }
}

function createMockLogger(): jest.Mocked<ILogger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('Invoker', () => {
  // ==========================================================================
  // OPTIONS
  // ==========================================================================

  describe('resolveInvokerOptions', () => {
    it('should apply defaults', () => {
      const options = resolveInvokerOptions();

      expect(options).toMatchObject({
        logLevel: 'info',
        payloadAliases: ['data', 'input'],
        attributeKeys: { routeParams: 'route-params', operation: 'operation' },
        typeCacheCapacity: 256,
        uriVarResolverPriority: 150,
        resolvers: [],
      });
      expect(DEFAULT_INVOKER_OPTIONS.typeCacheCapacity).toBe(256);
    });

    it('should merge partial attribute keys', () => {
      const options = resolveInvokerOptions({ attributeKeys: { operation: '_operation' } });

      expect(options.attributeKeys).toEqual({ routeParams: 'route-params', operation: '_operation' });
    });

    it('should keep a given logger', () => {
      const logger = createMockLogger();

      expect(resolveInvokerOptions({ logger }).logger).toBe(logger);
    });

    it('should reject an invalid cache capacity', () => {
      expect(() => resolveInvokerOptions({ typeCacheCapacity: 0 })).toThrow(
        'typeCacheCapacity must be a positive integer, got 0',
      );
    });
  });

  // ==========================================================================
  // COMPOSITION
  // ==========================================================================

  describe('StateInvoker', () => {
    it('should order the standard resolver chain', () => {
      const invoker = createInvoker({ logLevel: 'silent' });

      expect(invoker).toBeInstanceOf(StateInvoker);
      expect(invoker.argumentResolver.resolvers.map((resolver) => resolver.constructor)).toEqual([
        UriVarValueResolver,
        RequestAttributeValueResolver,
        RequestValueResolver,
        PayloadValueResolver,
        OperationValueResolver,
        DefaultValueResolver,
      ]);
    });

    it('should place the URI variable resolver at the configured priority', () => {
      const invoker = createInvoker({ logLevel: 'silent', uriVarResolverPriority: 75 });

      expect(invoker.argumentResolver.resolvers.map((resolver) => resolver.constructor)).toEqual([
        RequestAttributeValueResolver,
        UriVarValueResolver,
        RequestValueResolver,
        PayloadValueResolver,
        OperationValueResolver,
        DefaultValueResolver,
      ]);
    });

    it('should size the type cache', () => {
      const invoker = createInvoker({ logLevel: 'silent', typeCacheCapacity: 8 });

      expect(invoker.introspector.stats().capacity).toBe(8);
    });
  });

  // ==========================================================================
  // BUILDER
  // ==========================================================================

  describe('InvokerBuilder', () => {
    it('should build with the configured options', () => {
      const logger = createMockLogger();

      const invoker = createInvokerBuilder()
        .withLogger(logger)
        .withLogLevel('debug')
        .withPayloadAliases(['body'])
        .withAttributeKeys({ routeParams: '_route_params' })
        .withTypeCacheCapacity(16)
        .withUriVarResolverPriority(200)
        .build();

      expect(invoker.logger).toBe(logger);
      expect(invoker.options).toMatchObject({
        logLevel: 'debug',
        payloadAliases: ['body'],
        attributeKeys: { routeParams: '_route_params', operation: 'operation' },
        typeCacheCapacity: 16,
        uriVarResolverPriority: 200,
      });
    });

    it('should run added resolvers at their priority', async () => {
      const tenants = new TenantResolver();
      const invoker = createInvokerBuilder().withLogLevel('silent').addResolver(tenants, 120).build();
      const handler = defineInvokable([arg('tenant', 'string')], (tenant: string) => ({ tenant }));

      expect(invoker.argumentResolver.resolvers[1]).toBe(tenants);
      await expect(
        invoker.processorInvoker.invoke(handler, null, new Post(), {}, { request: new InvocationRequest() }),
      ).resolves.toEqual({ tenant: 'tenant-a' });
    });

    it('should let URI variables win over a lower priority resolver', async () => {
      const invoker = createInvokerBuilder().withLogLevel('silent').addResolver(new TenantResolver()).build();
      const handler = defineInvokable([arg('tenant', 'string')], (tenant: string) => ({ tenant }));

      await expect(
        invoker.processorInvoker.invoke(handler, null, new Post(), { tenant: 'tenant-b' }, {
          request: new InvocationRequest(),
        }),
      ).resolves.toEqual({ tenant: 'tenant-b' });
    });
  });
});
