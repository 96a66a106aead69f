/**
 * state-invoker - Binding Module
 *
 * Type acceptance, construction metadata, introspection, value object
 * construction and handler signatures.
 */

export { accepts, acceptsType, coerce, narrow, isNumeric, isStringable } from './ParamType';
export type { AcceptanceTarget } from './ParamType';

export {
  ConstructWith,
  Factory,
  Param,
  Internal,
  CONSTRUCT_WITH_KEY,
  FACTORY_RETURNS_KEY,
  PARAM_TYPES_KEY,
  INTERNAL_KEY,
  fromDesignType,
  getConstructWith,
  getDeclaredReturnType,
  getParameterTypes,
  isInternal,
} from './decorators';
export type { FactoryOptions } from './decorators';

export { TypeIntrospector, introspect } from './TypeIntrospector';
export type { TypeDescriptor, MethodDescriptor } from './TypeIntrospector';

export { ValueObjectInstantiator } from './ValueObjectInstantiator';

export { arg, defineInvokable, getInvokableSignature, isInvokable, handlerName } from './invokable';
export type { ArgOptions, InvokableHandler } from './invokable';
