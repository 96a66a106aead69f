/**
 * state-invoker - Handler Classification
 *
 * @module application/state/classifyHandler
 */

import { isInvokable, type InvokableHandler } from '../binding/invokable';
import type { HandlerRole } from '../invocation/InvocationBridge';
import { isStateProcessor } from './IStateProcessor';
import { isStateProvider } from './IStateProvider';

/**
 * How a registered handler is reached
 */
export type HandlerKind = { readonly kind: 'dynamic'; readonly handler: InvokableHandler } | { readonly kind: 'conventional' };

/**
 * A function that does not implement the role's fixed contract goes through
 * the dynamic path; everything else stays on the conventional path.
 *
 * @example
 * ```typescript
 * classifyHandler(createUser, 'processor');            // { kind: 'dynamic', handler: createUser }
 * classifyHandler(new PersistUserProcessor(), 'processor'); // { kind: 'conventional' }
 * ```
 */
export function classifyHandler(value: unknown, role: HandlerRole): HandlerKind {
  const implementsContract = role === 'processor' ? isStateProcessor(value) : isStateProvider(value);
  if (isInvokable(value) && !implementsContract) {
    return { kind: 'dynamic', handler: value };
  }
  return { kind: 'conventional' };
}
