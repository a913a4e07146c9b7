export * from './CacheRecord';
export * from './CacheStore';
export * from './CacheStoreFactory';
export * from './FileCacheStore';
export * from './MemoryCacheStore';
