/**
 * state-invoker - Cache Module
 */

export { CacheManager } from './CacheManager';
export type { CacheStats } from './CacheManager';
