/**
 * state-invoker - Handler Registry Contract
 *
 * @module application/di/IHandlerRegistry
 */

import { InvokerException } from '../../domain/exceptions/exceptions';

/**
 * Lookup of handlers by the identifiers operations reference. Entries are
 * untyped: a registered value may be a plain function (dynamic path) or an
 * object implementing a state contract (conventional path).
 *
 * @example
 * ```typescript
 * const registry: IHandlerRegistry = new HandlerContainer()
 *   .register('app.create_user', createUser)
 *   .addSingleton('app.user_provider', () => new UserProvider());
 * ```
 */
export interface IHandlerRegistry {
  has(id: string): boolean;

  /**
   * @throws {DependencyResolutionError} when `id` is not registered
   */
  get(id: string): unknown;
}

/**
 * Handler lifecycle
 */
export enum ServiceScope {
  /** Created once on first lookup, then shared */
  Singleton = 'singleton',

  /** Created on every lookup */
  Transient = 'transient',
}

/**
 * A handler lookup failed: unknown identifier, circular factory, or a
 * throwing factory.
 */
export class DependencyResolutionError extends InvokerException {
  /**
   * Chain of identifiers leading to the failure, one per line:
   *
   * ```
   * ├─ app.create_user
   *   └─ app.user_repository (UNREGISTERED)
   * ```
   */
  public readonly dependencyGraph: string;

  constructor(message: string, dependencyGraph: string = '') {
    super(message, { dependencyGraph });
    this.name = 'DependencyResolutionError';
    this.dependencyGraph = dependencyGraph;
  }
}
