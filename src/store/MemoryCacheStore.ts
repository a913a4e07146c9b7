import { CacheRecord, isExpired } from './CacheRecord';
import { ICacheStore } from './CacheStore';

/**
 * Keeps the cache in process memory only. Every restart starts from a
 * provider check.
 */
export class MemoryCacheStore implements ICacheStore {
  private record: CacheRecord | undefined;

  public async load(): Promise<CacheRecord | undefined> {
    return this.record ? { ...this.record } : undefined;
  }

  public async save(record: CacheRecord): Promise<void> {
    this.record = { ...record };
  }

  public isExpired(record: CacheRecord, now: Date, expiryMs: number): boolean {
    return isExpired(record, now, expiryMs);
  }
}
