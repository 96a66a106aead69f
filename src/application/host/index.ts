/**
 * state-invoker - Host Module
 *
 * Options and composition of the engine
 */

export { DEFAULT_INVOKER_OPTIONS, resolveInvokerOptions } from './options';
export type { InvokerOptions, ResolvedInvokerOptions, ResolverRegistration } from './options';

export { StateInvoker, InvokerBuilder, createInvoker, createInvokerBuilder } from './invoker';
