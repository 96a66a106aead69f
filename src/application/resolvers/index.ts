/**
 * state-invoker - Resolver Module
 */

export {
  UNRESOLVED,
  DEFAULT_ATTRIBUTE_KEYS,
  resolved,
  isRecord,
} from './IArgumentValueResolver';
export type {
  Resolution,
  AttributeKeys,
  ArgumentContext,
  IArgumentValueResolver,
} from './IArgumentValueResolver';

export { UriVarValueResolver, URI_VAR_RESOLVER_PRIORITY } from './UriVarValueResolver';
export { PayloadValueResolver, DEFAULT_PAYLOAD_ALIASES } from './PayloadValueResolver';
export { OperationValueResolver } from './OperationValueResolver';
export { RequestAttributeValueResolver } from './RequestAttributeValueResolver';
export { RequestValueResolver } from './RequestValueResolver';
export { DefaultValueResolver } from './DefaultValueResolver';
export { ArgumentResolver } from './ArgumentResolver';
export type { PrioritizedResolver } from './ArgumentResolver';
