import { CacheRecord } from './CacheRecord';

export interface ICacheStore {
  /** Resolves to undefined when there is no usable cache. Never rejects. */
  load(): Promise<CacheRecord | undefined>;
  /** Replaces the stored record. Rejects with IOError. */
  save(record: CacheRecord): Promise<void>;
  isExpired(record: CacheRecord, now: Date, expiryMs: number): boolean;
}
