/**
 * state-invoker - Type Module
 */

export {
  PRIMITIVE_KINDS,
  isPrimitiveKind,
  isClassType,
  isTypeRef,
  isSubclassOf,
  typeName,
} from './TypeRef';

export type { PrimitiveKind, ClassType, TypeRef } from './TypeRef';

export { describeParameter } from './ParameterDescriptor';
export type { ParameterDescriptor } from './ParameterDescriptor';
