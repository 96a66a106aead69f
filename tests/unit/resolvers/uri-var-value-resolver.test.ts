/**
 * @fileoverview Unit tests for UriVarValueResolver
 */

import {
  arg,
  InvocationRequest,
  RejectedValueError,
  UNRESOLVED,
  UriVarValueResolver,
  ValueObjectInstantiator,
  type ArgumentContext,
  type Resolution,
} from '../../../src';
import { CompanyId, StringUserId, UserId } from '../../fixtures/value-objects';

function contextWith(routeParams?: Record<string, unknown>, attributes: Record<string, unknown> = {}): ArgumentContext {
  const request = new InvocationRequest({
    attributes: routeParams === undefined ? attributes : { ...attributes, 'route-params': routeParams },
  });
  return { request, handler: 'handler' };
}

function valueOf(resolution: Resolution): unknown {
  if (!resolution.resolved) {
    throw new Error('Expected a resolved value');
  }
  return resolution.value;
}

describe('UriVarValueResolver', () => {
  let resolver: UriVarValueResolver;

  beforeEach(() => {
    resolver = new UriVarValueResolver(new ValueObjectInstantiator());
  });

  // ==========================================================================
  // LOOKUP
  // ==========================================================================

  describe('Lookup', () => {
    it('should read the binding tag', () => {
      const value = valueOf(
        resolver.resolve(arg('company', CompanyId, { bind: 'companyId' }), contextWith({ companyId: 'acme-corp' })),
      );

      expect(value).toBeInstanceOf(CompanyId);
      expect(value).toEqual(new CompanyId('acme-corp'));
    });

    it('should match the parameter name', () => {
      const value = valueOf(resolver.resolve(arg('companyId', CompanyId), contextWith({ companyId: 'acme-corp' })));

      expect(value).toEqual(new CompanyId('acme-corp'));
    });

    it('should prefer the binding tag over a value named like the parameter', () => {
      const resolution = resolver.resolve(arg('userId', 'int', { bind: 'id' }), contextWith({ id: '1', userId: '2' }));

      expect(resolution).toEqual({ resolved: true, value: 1 });
    });

    it('should fall back to carrier attributes for a binding tag', () => {
      const value = valueOf(
        resolver.resolve(arg('company', CompanyId, { bind: 'companyId' }), contextWith(undefined, { companyId: 'acme' })),
      );

      expect(value).toEqual(new CompanyId('acme'));
    });

    it('should not match names against carrier attributes', () => {
      const resolution = resolver.resolve(arg('companyId', CompanyId), contextWith(undefined, { companyId: 'acme' }));

      expect(resolution).toBe(UNRESOLVED);
    });

    it('should decline a missing value', () => {
      expect(resolver.resolve(arg('companyId', CompanyId), contextWith({ other: 'x' }))).toBe(UNRESOLVED);
    });

    it('should decline untyped parameters', () => {
      expect(resolver.resolve(arg('companyId'), contextWith({ companyId: 'acme' }))).toBe(UNRESOLVED);
    });

    it('should read a custom route parameter key', () => {
      const custom = new UriVarValueResolver(new ValueObjectInstantiator(), 'params');
      const context: ArgumentContext = {
        request: new InvocationRequest({ attributes: { params: { page: '3' } } }),
        handler: 'handler',
      };

      expect(custom.resolve(arg('page', 'int'), context)).toEqual({ resolved: true, value: 3 });
    });
  });

  // ==========================================================================
  // TYPING
  // ==========================================================================

  describe('Typing', () => {
    it('should coerce a single primitive type', () => {
      expect(resolver.resolve(arg('userId', 'int'), contextWith({ userId: '456' }))).toEqual({
        resolved: true,
        value: 456,
      });
    });

    it('should give null to a nullable parameter', () => {
      expect(resolver.resolve(arg('companyId', CompanyId, { nullable: true }), contextWith({ companyId: null }))).toEqual({
        resolved: true,
        value: null,
      });
    });

    it('should reject null for a non-nullable value object', () => {
      expect(() => resolver.resolve(arg('companyId', CompanyId), contextWith({ companyId: null }))).toThrowErrorType(
        RejectedValueError,
      );
    });

    it('should keep a value a union primitive accepts as is', () => {
      expect(resolver.resolve(arg('id', ['int', UserId]), contextWith({ id: 42 }))).toEqual({
        resolved: true,
        value: 42,
      });
    });

    it('should build the union class when no primitive accepts the value strictly', () => {
      const value = valueOf(resolver.resolve(arg('id', ['int', UserId]), contextWith({ id: '42' })));

      expect(value).toBeInstanceOf(UserId);
      expect(value).toEqual(new UserId(42));
    });

    it('should decline a union of several classes', () => {
      expect(resolver.resolve(arg('id', [CompanyId, StringUserId]), contextWith({ id: 'x' }))).toBe(UNRESOLVED);
    });

    it('should pass an existing instance through', () => {
      const companyId = new CompanyId('acme-corp');

      expect(valueOf(resolver.resolve(arg('companyId', CompanyId), contextWith({ companyId })))).toBe(companyId);
    });
  });
});
