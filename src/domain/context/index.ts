/**
 * state-invoker - Context Module
 *
 * The request carrier and its attribute store
 */

export { AttributeBag } from './AttributeBag';
export { InvocationRequest, isInvocationRequest } from './InvocationRequest';
export type { InvocationRequestInit } from './InvocationRequest';
export type { StateContext, UriVariables } from './StateContext';
