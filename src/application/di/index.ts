/**
 * state-invoker - Handler Registry Module
 */

export { ServiceScope, DependencyResolutionError } from './IHandlerRegistry';
export type { IHandlerRegistry } from './IHandlerRegistry';
export { HandlerContainer } from './HandlerContainer';
export type { HandlerFactory } from './HandlerContainer';
