/**
 * state-invoker - Attribute Bag
 *
 * Mutable string-keyed store carried by an {@link InvocationRequest}. The
 * routing layer places raw URI values here; the invocation bridge adds the
 * merged route parameters and the matched operation for resolvers to read.
 *
 * @module domain/context/AttributeBag
 */

export class AttributeBag {
  private readonly data = new Map<string, unknown>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.data.set(key, value);
    }
  }

  /**
   * Whether the key is present, even when its value is `null`
   */
  has(key: string): boolean {
    return this.data.has(key);
  }

  get(key: string, fallback?: unknown): unknown {
    return this.data.has(key) ? this.data.get(key) : fallback;
  }

  set(key: string, value: unknown): this {
    this.data.set(key, value);
    return this;
  }

  /**
   * Set the value only when the key is absent.
   *
   * @returns true if the value was written
   */
  setIfAbsent(key: string, value: unknown): boolean {
    if (this.data.has(key)) {
      return false;
    }
    this.data.set(key, value);
    return true;
  }

  delete(key: string): boolean {
    return this.data.delete(key);
  }

  keys(): string[] {
    return Array.from(this.data.keys());
  }

  get size(): number {
    return this.data.size;
  }
}
