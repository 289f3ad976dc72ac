export { StateCache, type CacheEntry, type CacheResult, type StateCacheOptions } from './StateCache.js';
