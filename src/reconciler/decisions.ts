import { DdnsError } from '../errors';
import { DnsRecordRef } from '../providers/DnsProvider';
import { canonicalAddress } from '../resolvers/address';
import { CacheRecord } from '../store/CacheRecord';

export type CacheCheckReason = 'cache absent' | 'record mismatch' | 'cache expired' | 'ip changed';

export type CacheDecision =
  | { kind: 'hit'; reason: 'cache hit, IP unchanged' }
  | { kind: 'check'; reason: CacheCheckReason };

export type ReconciliationDecision =
  | { kind: 'skip'; reason: string }
  | { kind: 'update'; oldIp: string; newIp: string };

export type CycleStep = 'resolve' | 'lookup' | 'update' | 'cycle';

export type CycleOutcome =
  | { status: 'skipped'; ip: string; reason: string }
  | { status: 'unchanged'; ip: string; cacheSaved: boolean }
  | { status: 'updated'; previousIp: string; ip: string; cacheSaved: boolean }
  | { status: 'failed'; step: CycleStep; error: DdnsError };

/**
 * Whether the local cache alone can vouch for the published record. Only a
 * fresh cache for the same record holding the same address skips the provider.
 */
export const decideFromCache = (
  cached: CacheRecord | undefined,
  currentIp: string,
  record: DnsRecordRef,
  isExpired: (cached: CacheRecord) => boolean
): CacheDecision => {
  if (!cached) return { kind: 'check', reason: 'cache absent' };

  const nameMismatch = cached.recordName !== undefined && cached.recordName !== record.name;
  const typeMismatch = cached.recordType !== undefined && cached.recordType !== record.type;
  if (nameMismatch || typeMismatch) return { kind: 'check', reason: 'record mismatch' };

  if (isExpired(cached)) return { kind: 'check', reason: 'cache expired' };
  if (canonicalAddress(cached.ip) !== canonicalAddress(currentIp)) return { kind: 'check', reason: 'ip changed' };

  return { kind: 'hit', reason: 'cache hit, IP unchanged' };
};

export const decideFromRemote = (remoteIp: string, currentIp: string): ReconciliationDecision =>
  canonicalAddress(remoteIp) === canonicalAddress(currentIp)
    ? { kind: 'skip', reason: 'remote already current' }
    : { kind: 'update', oldIp: remoteIp, newIp: currentIp };
