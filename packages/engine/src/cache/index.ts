export {
	createCacheManager,
	type CacheEntry,
	type CacheLookup,
	type CacheManager,
	type CacheManagerOptions,
	type CacheRegion,
	type CacheRegionOptions,
	type CacheStats,
	type GetOrComputeOptions,
} from "./cache-manager";
export { deriveCacheKey, stableStringify } from "./cache-key";
