/**
 * state-invoker - Invocation Module
 */

export { InvocationBridge } from './InvocationBridge';
export type { HandlerRole, InvocationBridgeOptions } from './InvocationBridge';
export { ProcessorInvoker } from './ProcessorInvoker';
export { ProviderInvoker } from './ProviderInvoker';
