/**
 * state-invoker - Infrastructure Layer
 */

export * from './logging';
export * from './cache';
