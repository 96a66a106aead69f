/**
 * @fileoverview state-invoker - Parameter Binding & Dispatch Engine
 * @description
 * Binds raw named values (URI variables, a write payload, the matched
 * operation) onto the declared parameters of plain handler functions, builds
 * typed value objects from raw scalars, and decides per request whether a
 * registered handler runs through this dynamic path or through the
 * conventional processor/provider contract.
 *
 * ## Layers
 *
 * - **domain**: type references, the request carrier, operations, errors
 * - **application**: binding, resolver chain, invocation bridges, dispatch
 *   decorators, handler registry, composition root
 * - **infrastructure**: logging and the introspection cache
 *
 * @example
 * ```typescript
 * import 'reflect-metadata';
 * import { arg, createInvoker, defineInvokable, HandlerContainer, InvocationRequest, Post } from 'state-invoker';
 *
 * const createUser = defineInvokable(
 *   [arg('data', UserResource), arg('companyId', CompanyId)],
 *   async (data: UserResource, companyId: CompanyId) => data.withCompany(companyId),
 * );
 *
 * const invoker = createInvoker();
 * const processor = invoker.decorateProcessor(persistProcessor, new HandlerContainer().register('app.create_user', createUser));
 *
 * await processor.process(input, new Post({ processor: 'app.create_user' }), { companyId: 'acme-corp' }, {
 *   request: new InvocationRequest({ method: 'POST' }),
 * });
 * ```
 *
 * @packageDocumentation
 * @module state-invoker
 */

import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';
