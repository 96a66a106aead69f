/**
 * @fileoverview Integration tests for write calls through the decorated processor
 *
 * Exercises the whole path: dispatch decision, attribute propagation,
 * argument resolution, value object construction and result validation.
 */

import {
  arg,
  createInvoker,
  defineInvokable,
  HandlerContainer,
  InvalidResultShapeError,
  InvocationRequest,
  Post,
  Put,
  UnresolvedArgumentError,
  type IStateProcessor,
} from '../../src';
import { createUserHandler, TraditionalProcessor, UserResource } from '../fixtures/handlers';
import { CompanyId, SequenceNumber, UserId } from '../fixtures/value-objects';

describe('Processor end to end', () => {
  let inner: TraditionalProcessor;
  let handlers: HandlerContainer;
  let processor: IStateProcessor;

  const updateUser = defineInvokable(
    [arg('input', UserResource), arg('userId', UserId), arg('sequence', SequenceNumber, { bind: 'userId' })],
    function updateUser(input: UserResource, userId: UserId, sequence: SequenceNumber): UserResource {
      input.id = String(userId.toInt());
      input.processed = sequence.value === userId.toInt();
      return input;
    },
  );

  const renameUser = defineInvokable([arg('data', UserResource)], function renameUser(data: UserResource): string {
    return data.name.toUpperCase();
  });

  beforeEach(() => {
    inner = new TraditionalProcessor();
    handlers = new HandlerContainer()
      .register('app.create_user', createUserHandler)
      .register('app.update_user', updateUser)
      .register('app.rename_user', renameUser)
      .addSingleton('app.persist_user', () => new TraditionalProcessor());
    processor = createInvoker({ logLevel: 'silent' }).decorateProcessor(inner, handlers);
  });

  it('should build a tagged value object from a URI variable', async () => {
    const data = new UserResource({ name: 'John Doe', email: 'john@example.com' });
    const request = new InvocationRequest({ method: 'POST', path: '/companies/acme-corp/users' });

    const result = await processor.process(
      data,
      new Post({ uriTemplate: '/companies/{companyId}/users', processor: 'app.create_user' }),
      { companyId: 'acme-corp' },
      { request },
    );

    expect(result).toBe(data);
    expect(data).toMatchObject({ companyId: 'acme-corp', processed: true, hasRequest: true });
    expect(request.attributes.get('companyId')).toBe('acme-corp');
  });

  it('should build value objects from a numeric URI variable', async () => {
    const data = new UserResource({ name: 'Jane' });

    await processor.process(data, new Put({ processor: 'app.update_user' }), { userId: '456' }, {
      request: new InvocationRequest(),
    });

    expect(data.id).toBe('456');
    expect(data.processed).toBe(true);
  });

  it('should store the integer inside the value object', async () => {
    const seen: unknown[] = [];
    const capture = defineInvokable(
      [arg('userId', UserId), arg('sequence', SequenceNumber, { bind: 'userId' })],
      (userId: UserId, sequence: SequenceNumber) => {
        seen.push(userId.value, sequence.value);
        return {};
      },
    );
    handlers.register('app.capture', capture);

    await processor.process(null, new Put({ processor: 'app.capture' }), { userId: '456' }, {
      request: new InvocationRequest(),
    });

    expect(seen).toEqual([456, 456]);
  });

  it('should reject a handler returning a string', async () => {
    const call = processor.process(new UserResource({ name: 'john' }), new Post({ processor: 'app.rename_user' }), {}, {
      request: new InvocationRequest(),
    });

    await expect(call).rejects.toThrowErrorType(InvalidResultShapeError);
  });

  it('should report the missing URI variable by parameter name', async () => {
    await expect(
      processor.process(new UserResource(), new Post({ processor: 'app.create_user' }), {}, {
        request: new InvocationRequest(),
      }),
    ).rejects.toThrowErrorType(UnresolvedArgumentError);
  });

  it('should leave conventional processors to the wrapped implementation', async () => {
    const data = new UserResource({ name: 'John' });

    const result = await processor.process(data, new Post({ processor: 'app.persist_user' }), {
      companyId: 'acme-corp',
    });

    expect(result).toBe(data);
    expect(data.processed).toBe(false);
    expect(data.companyId).toBeNull();
    expect(inner.calls).toHaveLength(1);
  });

  it('should not require a request on the conventional path', async () => {
    await expect(processor.process(new UserResource(), new Post({ processor: 'app.unknown' }))).resolves.toBeInstanceOf(
      UserResource,
    );
  });

  it('should pass existing value objects through', async () => {
    const companyId = new CompanyId('acme-corp');
    const data = new UserResource();

    await processor.process(data, new Post({ processor: 'app.create_user' }), { companyId }, {
      request: new InvocationRequest(),
    });

    expect(data.companyId).toBe('acme-corp');
  });
});
