/**
 * state-invoker - Handler Container
 *
 * Default {@link IHandlerRegistry}: values, singleton factories and transient
 * factories keyed by identifier. Factories receive the container and may look
 * up other handlers; cycles are reported with the lookup chain.
 *
 * @module application/di/HandlerContainer
 */

import { DependencyResolutionError, ServiceScope, type IHandlerRegistry } from './IHandlerRegistry';

export type HandlerFactory<T = unknown> = (container: HandlerContainer) => T;

interface HandlerDescriptor {
  scope: ServiceScope;
  factory: HandlerFactory;
  instance?: { value: unknown };
}

export class HandlerContainer implements IHandlerRegistry {
  private readonly descriptors = new Map<string, HandlerDescriptor>();
  private readonly resolutionStack: string[] = [];

  /**
   * Register a ready-made handler (a function or a contract implementation)
   */
  register(id: string, handler: unknown): this {
    this.descriptors.set(id, {
      scope: ServiceScope.Singleton,
      factory: () => handler,
      instance: { value: handler },
    });
    return this;
  }

  addSingleton<T>(id: string, factory: HandlerFactory<T>): this {
    this.descriptors.set(id, { scope: ServiceScope.Singleton, factory });
    return this;
  }

  addTransient<T>(id: string, factory: HandlerFactory<T>): this {
    this.descriptors.set(id, { scope: ServiceScope.Transient, factory });
    return this;
  }

  has(id: string): boolean {
    return this.descriptors.has(id);
  }

  get(id: string): unknown {
    const descriptor = this.descriptors.get(id);
    if (!descriptor) {
      throw new DependencyResolutionError(
        `Handler '${id}' is not registered`,
        this.buildGraph(`${id} (UNREGISTERED)`),
      );
    }

    if (descriptor.instance) {
      return descriptor.instance.value;
    }

    if (this.resolutionStack.includes(id)) {
      throw new DependencyResolutionError(
        `Circular dependency detected: ${[...this.resolutionStack, id].join(' → ')}`,
        this.buildGraph(`${id} (CIRCULAR!)`),
      );
    }

    this.resolutionStack.push(id);
    try {
      const value = descriptor.factory(this);
      if (descriptor.scope === ServiceScope.Singleton) {
        descriptor.instance = { value };
      }
      return value;
    } catch (error) {
      if (error instanceof DependencyResolutionError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new DependencyResolutionError(
        `Failed to resolve '${id}': ${reason}`,
        this.buildGraph(`${id} (FAILED)`, this.resolutionStack.slice(0, -1)),
      );
    } finally {
      this.resolutionStack.pop();
    }
  }

  /**
   * Registered identifiers in registration order
   */
  ids(): string[] {
    return Array.from(this.descriptors.keys());
  }

  scopeOf(id: string): ServiceScope | undefined {
    return this.descriptors.get(id)?.scope;
  }

  private buildGraph(current: string, stack: readonly string[] = this.resolutionStack): string {
    let graph = '';
    stack.forEach((id, depth) => {
      graph += `${'  '.repeat(depth)}├─ ${id}\n`;
    });
    graph += `${'  '.repeat(stack.length)}└─ ${current}\n`;
    return graph;
  }
}
