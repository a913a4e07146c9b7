import { z } from 'zod';
import { RECORD_TYPES, RecordType } from '../providers/DnsProvider';

export interface CacheRecord {
  /** Last address confirmed to be published at the provider */
  ip: string;
  /** When that address was last verified against the provider */
  checkedAt: Date;
  /** When this process last changed the remote record */
  updatedAt?: Date;
  recordName?: string;
  recordType?: RecordType;
}

/** How far a stored `checkedAt` may lie ahead of the local clock and still count. */
export const MAX_CLOCK_SKEW_MS = 5 * 60 * 1000;

// RFC 3339 with offset, or epoch seconds.
const Timestamp = z
  .union([z.string().datetime({ offset: true }), z.number().finite().nonnegative()])
  .transform(value => (typeof value === 'number' ? new Date(value * 1000) : new Date(value)))
  .refine(date => !Number.isNaN(date.getTime()), 'timestamp out of range');

/** On-disk shape. Unknown keys are dropped so newer files still load. */
export const CacheFileSchema = z.object({
  ip: z.string().min(1),
  checked_at: Timestamp,
  updated_at: Timestamp.optional(),
  record_name: z.string().optional(),
  record_type: z.enum(RECORD_TYPES).optional(),
});

export type CacheFile = z.input<typeof CacheFileSchema>;

// Files from earlier releases: `ip_address` and `last_checked`.
const LegacyCacheFileSchema = z.object({
  ip_address: z.string().min(1),
  last_checked: Timestamp,
  record_name: z.string().optional(),
  record_type: z.enum(RECORD_TYPES).optional(),
});

export const fromCacheFile = (data: unknown): CacheRecord | undefined => {
  const parsed = CacheFileSchema.safeParse(data);
  if (parsed.success) {
    const file = parsed.data;
    return {
      ip: file.ip,
      checkedAt: file.checked_at,
      updatedAt: file.updated_at,
      recordName: file.record_name,
      recordType: file.record_type,
    };
  }

  const legacy = LegacyCacheFileSchema.safeParse(data);
  if (!legacy.success) return undefined;

  return {
    ip: legacy.data.ip_address,
    checkedAt: legacy.data.last_checked,
    updatedAt: undefined,
    recordName: legacy.data.record_name,
    recordType: legacy.data.record_type,
  };
};

export const toCacheFile = (record: CacheRecord): CacheFile => ({
  ip: record.ip,
  checked_at: record.checkedAt.toISOString(),
  updated_at: record.updatedAt?.toISOString(),
  record_name: record.recordName,
  record_type: record.recordType,
});

/** A `checkedAt` further ahead than the allowed clock skew cannot be trusted. */
export const isFromFuture = (record: CacheRecord, now: Date): boolean =>
  record.checkedAt.getTime() - now.getTime() > MAX_CLOCK_SKEW_MS;

export const isExpired = (record: CacheRecord, now: Date, expiryMs: number): boolean =>
  isFromFuture(record, now) || now.getTime() - record.checkedAt.getTime() >= expiryMs;
