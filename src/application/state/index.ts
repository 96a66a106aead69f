/**
 * state-invoker - State Module
 *
 * Processor/provider contracts and the decorators choosing between the
 * conventional and the dynamic path.
 */

export { isStateProcessor } from './IStateProcessor';
export type { IStateProcessor } from './IStateProcessor';
export { isStateProvider } from './IStateProvider';
export type { IStateProvider } from './IStateProvider';
export { classifyHandler } from './classifyHandler';
export type { HandlerKind } from './classifyHandler';
export { InvokableProcessorDecorator } from './InvokableProcessorDecorator';
export { InvokableProviderDecorator } from './InvokableProviderDecorator';
