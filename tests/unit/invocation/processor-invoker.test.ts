/**
 * @fileoverview Unit tests for ProcessorInvoker
 */

import {
  createInvoker,
  defineInvokable,
  InvalidResultShapeError,
  InvocationRequest,
  MissingCarrierError,
  Post,
  type ILogger,
  type ProcessorInvoker,
} from '../../../src';
import { createUserHandler, UserResource } from '../../fixtures/handlers';

function createMockLogger(): jest.Mocked<ILogger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('ProcessorInvoker', () => {
  const operation = new Post({ name: 'user_create', processor: 'app.create_user' });
  let logger: jest.Mocked<ILogger>;
  let invoker: ProcessorInvoker;

  beforeEach(() => {
    logger = createMockLogger();
    invoker = createInvoker({ logger }).processorInvoker;
  });

  // ==========================================================================
  // CARRIER
  // ==========================================================================

  describe('Carrier', () => {
    it('should reject a call without a request', async () => {
      await expect(invoker.invoke(createUserHandler, new UserResource(), operation)).rejects.toThrowErrorType(
        MissingCarrierError,
      );
      await expect(invoker.invoke(createUserHandler, new UserResource(), operation)).rejects.toThrow(
        'No request in context; invokable processors are request-only. ' +
          'Ensure the framework passes the request as context.request.',
      );
    });

    it('should reject a request that is not a carrier', async () => {
      await expect(
        invoker.invoke(createUserHandler, new UserResource(), operation, {}, { request: { attributes: {} } }),
      ).rejects.toThrowErrorType(MissingCarrierError);
    });
  });

  // ==========================================================================
  // ATTRIBUTE PROPAGATION
  // ==========================================================================

  describe('Attribute propagation', () => {
    it('should write URI variables once and merge them into route parameters', async () => {
      const request = new InvocationRequest({
        attributes: { companyId: 'from-router', 'route-params': { page: '1' } },
      });

      await invoker.invoke(createUserHandler, new UserResource(), operation, { companyId: 'acme-corp', extra: 'x' }, {
        request,
      });

      expect(request.attributes.get('companyId')).toBe('from-router');
      expect(request.attributes.get('extra')).toBe('x');
      expect(request.attributes.get('route-params')).toEqual({ page: '1', companyId: 'acme-corp', extra: 'x' });
      expect(request.attributes.get('operation')).toBe(operation);
    });

    it('should replace a route parameter map that is not a record', async () => {
      const request = new InvocationRequest({ attributes: { 'route-params': ['stale'] } });

      await invoker.invoke(createUserHandler, new UserResource(), operation, { companyId: 'acme-corp' }, { request });

      expect(request.attributes.get('route-params')).toEqual({ companyId: 'acme-corp' });
    });

    it('should use custom attribute keys', async () => {
      const custom = createInvoker({
        logLevel: 'silent',
        attributeKeys: { routeParams: '_route_params', operation: '_operation' },
      }).processorInvoker;
      const request = new InvocationRequest();

      await custom.invoke(createUserHandler, new UserResource(), operation, { companyId: 'acme-corp' }, { request });

      expect(request.attributes.get('_route_params')).toEqual({ companyId: 'acme-corp' });
      expect(request.attributes.get('_operation')).toBe(operation);
      expect(request.attributes.has('route-params')).toBe(false);
    });
  });

  // ==========================================================================
  // INVOCATION
  // ==========================================================================

  describe('Invocation', () => {
    it('should call the handler with resolved arguments', async () => {
      const data = new UserResource({ name: 'John', email: 'john@example.com' });

      const result = await invoker.invoke(createUserHandler, data, operation, { companyId: 'acme-corp' }, {
        request: new InvocationRequest(),
      });

      expect(result).toBe(data);
      expect(data).toMatchObject({ companyId: 'acme-corp', processed: true, hasRequest: true });
    });

    it('should await asynchronous handlers', async () => {
      const handler = defineInvokable([], async () => ({ saved: true }));

      await expect(invoker.invoke(handler, null, operation, {}, { request: new InvocationRequest() })).resolves.toEqual({
        saved: true,
      });
    });

    it('should propagate handler errors', async () => {
      const handler = defineInvokable([], () => {
        throw new Error('Duplicate email');
      });

      await expect(invoker.invoke(handler, null, operation, {}, { request: new InvocationRequest() })).rejects.toThrow(
        'Duplicate email',
      );
    });

    it('should log the dispatch', async () => {
      await invoker.invoke(createUserHandler, new UserResource(), operation, { companyId: 'acme-corp' }, {
        request: new InvocationRequest(),
      });

      expect(logger.debug).toHaveBeenCalledWith('Invoking processor createUser', {
        operation: 'user_create',
        arguments: 3,
      });
    });
  });

  // ==========================================================================
  // RESULT SHAPE
  // ==========================================================================

  describe('Result shape', () => {
    const request = (): { request: InvocationRequest } => ({ request: new InvocationRequest() });

    it('should reject a string result', async () => {
      const handler = defineInvokable([], () => 'created');

      await expect(invoker.invoke(handler, null, operation, {}, request())).rejects.toThrow(
        'Processor must return an object (DTO/Resource), got string.',
      );
    });

    it('should reject null and arrays', async () => {
      const returnsNull = defineInvokable([], () => null);
      const returnsArray = defineInvokable([], () => [1, 2]);

      await expect(invoker.invoke(returnsNull, null, operation, {}, request())).rejects.toThrow('got null.');
      await expect(invoker.invoke(returnsArray, null, operation, {}, request())).rejects.toThrow('got array.');
    });

    it('should expose the received kind', async () => {
      const handler = defineInvokable([], () => 42);

      await expect(invoker.invoke(handler, null, operation, {}, request())).rejects.toMatchObject({
        role: 'processor',
        received: 'number',
      });
      await expect(invoker.invoke(handler, null, operation, {}, request())).rejects.toThrowErrorType(
        InvalidResultShapeError,
      );
    });
  });
});
