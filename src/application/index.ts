/**
 * state-invoker - Application Layer
 */

export * from './binding';
export * from './resolvers';
export * from './invocation';
export * from './state';
export * from './di';
export * from './host';
