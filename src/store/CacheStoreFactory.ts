import path from 'path';
import { Config } from '../configurations';
import { Logger } from '../logging/Logger';
import { ICacheStore } from './CacheStore';
import { FileCacheStore } from './FileCacheStore';
import { MemoryCacheStore } from './MemoryCacheStore';

export const CACHE_DISABLED = 'none';

/**
 * Picks the cache store from configuration. `CACHE_PATH=none` keeps the cache
 * in memory, so nothing survives a restart.
 */
export class CacheStoreFactory {
  public static create(config: Config, logger: Logger): ICacheStore {
    if (config.CACHE_PATH.toLowerCase() === CACHE_DISABLED) {
      logger.info('Cache file disabled, keeping last known state in memory');
      return new MemoryCacheStore();
    }
    return new FileCacheStore(path.resolve(config.CACHE_PATH), logger);
  }
}
