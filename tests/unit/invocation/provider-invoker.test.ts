/**
 * @fileoverview Unit tests for ProviderInvoker
 */

import {
  arg,
  createInvoker,
  defineInvokable,
  Get,
  GetCollection,
  InvalidResultShapeError,
  InvocationRequest,
  MissingCarrierError,
  type ProviderInvoker,
} from '../../../src';
import { getUserHandler, UserResource } from '../../fixtures/handlers';

describe('ProviderInvoker', () => {
  const operation = new Get({ name: 'user_get', provider: 'app.get_user' });
  let invoker: ProviderInvoker;

  beforeEach(() => {
    invoker = createInvoker({ logLevel: 'silent' }).providerInvoker;
  });

  it('should reject a call without a request', async () => {
    await expect(invoker.invoke(getUserHandler, operation, { id: '123' })).rejects.toThrowErrorType(MissingCarrierError);
    await expect(invoker.invoke(getUserHandler, operation, { id: '123' })).rejects.toThrow(
      'No request in context; invokable providers are request-only.',
    );
  });

  it('should load a resource from URI variables', async () => {
    const result = await invoker.invoke(getUserHandler, operation, { id: '123', companyId: 'acme-corp' }, {
      request: new InvocationRequest(),
    });

    expect(result).toBeInstanceOf(UserResource);
    expect(result).toMatchObject({ id: '123', companyId: 'acme-corp', loaded: true, hasRequest: true });
  });

  it('should return collections', async () => {
    const listUsers = defineInvokable([arg('limit', 'int', { default: 2 })], (limit: number) =>
      Array.from({ length: limit }, (_, index) => new UserResource({ id: String(index + 1) })),
    );

    const result = await invoker.invoke(listUsers, new GetCollection(), {}, { request: new InvocationRequest() });

    expect(Array.isArray(result)).toBe(true);
    expect(result).toEqual([new UserResource({ id: '1' }), new UserResource({ id: '2' })]);
  });

  it('should accept iterable objects', async () => {
    const ids = new Set(['1', '2']);
    const handler = defineInvokable([], () => ids);

    await expect(invoker.invoke(handler, operation, {}, { request: new InvocationRequest() })).resolves.toBe(ids);
  });

  it('should normalise a missing result to null', async () => {
    const returnsUndefined = defineInvokable([], () => undefined);
    const returnsNull = defineInvokable([], async () => null);

    await expect(invoker.invoke(returnsUndefined, operation, {}, { request: new InvocationRequest() })).resolves.toBeNull();
    await expect(invoker.invoke(returnsNull, operation, {}, { request: new InvocationRequest() })).resolves.toBeNull();
  });

  it('should reject primitive results', async () => {
    const handler = defineInvokable([], () => 42);

    await expect(invoker.invoke(handler, operation, {}, { request: new InvocationRequest() })).rejects.toThrow(
      'Provider must return an object or iterable (or null), got number.',
    );
    await expect(invoker.invoke(handler, operation, {}, { request: new InvocationRequest() })).rejects.toThrowErrorType(
      InvalidResultShapeError,
    );
  });

  it('should give no payload to read handlers', async () => {
    const handler = defineInvokable([arg('data', [], { default: 'none' })], (data: unknown) => ({ data }));

    await expect(invoker.invoke(handler, operation, {}, { request: new InvocationRequest() })).resolves.toEqual({
      data: 'none',
    });
  });
});
