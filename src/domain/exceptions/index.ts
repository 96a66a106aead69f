/**
 * state-invoker - Exception Module
 */

export {
  InvokerException,
  InvalidTaggedStrategyError,
  RejectedValueError,
  NoConstructionStrategyError,
  AmbiguousConstructionError,
  ConstructionResultError,
  InvalidSignatureError,
  UnresolvedArgumentError,
  MissingCarrierError,
  InvalidResultShapeError,
  describeValue,
} from './exceptions';
