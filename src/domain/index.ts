/**
 * state-invoker - Domain Layer
 */

export * from './types';
export * from './context';
export * from './operation';
export * from './exceptions';
