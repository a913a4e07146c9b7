export const RECORD_TYPES = ['A', 'AAAA'] as const;

export type RecordType = (typeof RECORD_TYPES)[number];

/** The record this process keeps current. Fixed for the lifetime of the process. */
export interface DnsRecordRef {
  name: string;
  type: RecordType;
  /** 1 lets the provider pick the TTL. */
  ttl: number;
}

/** A DNS record as the provider reports it */
export interface ProviderRecord {
  id: string;
  name: string;
  type: string;
  content: string;
  ttl: number;
}

export interface RecordUpdate {
  name: string;
  type: RecordType;
  content: string;
  ttl: number;
}

export interface DnsProvider {
  readonly name: string;
  /**
   * Look up the single record matching name and type.
   * Rejects with NotFoundError when nothing or more than one record matches.
   */
  findRecord(zoneId: string, name: string, type: RecordType): Promise<ProviderRecord>;
  updateRecord(zoneId: string, recordId: string, update: RecordUpdate): Promise<ProviderRecord>;
}
