/**
 * state-invoker - Cache Manager
 *
 * Bounded LRU cache for introspection results. Entries are pure functions of
 * a type's static declaration, so an evicted or concurrently recomputed entry
 * is simply rebuilt.
 */

/**
 * Cache entry wrapper, so that `undefined` values are distinguishable from
 * missing keys
 */
interface CacheEntry<V> {
  value: V;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  capacity: number;
  hitRate: number;
}

/**
 * CacheManager - LRU cache keyed by identity
 *
 * @template K - Key type
 * @template V - Value type
 *
 * @example
 * ```typescript
 * const cache = new CacheManager<ClassType, TypeDescriptor>(256);
 * const descriptor = cache.getOrSet(CompanyId, () => introspect(CompanyId));
 * ```
 */
export class CacheManager<K, V> {
  private entries: Map<K, CacheEntry<V>> = new Map();
  private hits = 0;
  private misses = 0;

  constructor(private readonly capacity: number = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Get a value and mark it as most recently used
   */
  get(key: K): V | undefined {
    return this.lookup(key)?.value;
  }

  /**
   * Set a value, evicting the least recently used entry at capacity
   */
  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(key, { value });
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  /**
   * Clear all entries and reset statistics
   */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  /**
   * Get from cache or compute and store
   */
  getOrSet(key: K, factory: () => V): V {
    const entry = this.lookup(key);
    if (entry) {
      return entry.value;
    }

    const value = factory();
    this.set(key, value);
    return value;
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      capacity: this.capacity,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  get size(): number {
    return this.entries.size;
  }

  private lookup(key: K): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    // Move to end (most recently used)
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry;
  }
}
