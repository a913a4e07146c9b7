import { DdnsError, NetworkError, toDdnsError } from '../errors';
import { Logger } from '../logging/Logger';
import { DnsProvider, DnsRecordRef, ProviderRecord } from '../providers/DnsProvider';
import { canonicalAddress } from '../resolvers/address';
import { IpResolver } from '../resolvers/IpResolver';
import { CacheRecord, ICacheStore, isFromFuture } from '../store';
import { CacheCheckReason, CycleOutcome, CycleStep, decideFromCache, decideFromRemote } from './decisions';

export interface RecordReconcilerOptions {
  zoneId: string;
  record: DnsRecordRef;
  cacheExpiryMs: number;
  now?: () => Date;
}

/**
 * One reconciliation cycle: resolve the public IP, consult the cache, and only
 * when the cache cannot vouch for the published value ask the provider and,
 * if needed, update it. `reconcile()` never rejects.
 */
export class RecordReconciler {
  private readonly zoneId: string;
  private readonly record: DnsRecordRef;
  private readonly cacheExpiryMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly resolver: IpResolver,
    private readonly cache: ICacheStore,
    private readonly provider: DnsProvider,
    private readonly logger: Logger,
    options: RecordReconcilerOptions
  ) {
    this.zoneId = options.zoneId;
    this.record = options.record;
    this.cacheExpiryMs = options.cacheExpiryMs;
    this.now = options.now ?? (() => new Date());
  }

  public async reconcile(): Promise<CycleOutcome> {
    const { name, type } = this.record;

    let currentIp: string;
    try {
      currentIp = await this.resolver.resolve();
    } catch (error) {
      return this.fail('resolve', toDdnsError(error, (message, options) => new NetworkError(message, options)));
    }
    this.logger.info(`Current public IP: ${currentIp}`);

    const cached = await this.loadCache();
    const cacheDecision = decideFromCache(cached, currentIp, this.record, c =>
      this.cache.isExpired(c, this.now(), this.cacheExpiryMs)
    );

    if (cacheDecision.kind === 'hit') {
      this.logger.info(`Cache hit, IP unchanged (${currentIp}), skipping ${this.provider.name} API call`, {
        lastChecked: cached?.checkedAt.toISOString(),
      });
      return { status: 'skipped', ip: currentIp, reason: cacheDecision.reason };
    }

    this.logger.info(this.describeCacheMiss(cacheDecision.reason, cached, currentIp));

    let remote: ProviderRecord;
    try {
      remote = await this.provider.findRecord(this.zoneId, name, type);
    } catch (error) {
      return this.fail('lookup', toDdnsError(error));
    }
    this.logger.info(`Found ${remote.type} record ${remote.name} -> ${remote.content} (TTL ${remote.ttl})`);

    const decision = decideFromRemote(remote.content, currentIp);

    if (decision.kind === 'skip') {
      this.logger.info(`DNS record ${name} is already up to date`);
      const sameIp = cached !== undefined && canonicalAddress(cached.ip) === currentIp;
      const cacheSaved = await this.writeCache(currentIp, cached, sameIp ? cached.updatedAt : undefined);
      return { status: 'unchanged', ip: currentIp, cacheSaved };
    }

    this.logger.info(`Updating DNS record ${name} from ${decision.oldIp} to ${decision.newIp}`);
    try {
      await this.provider.updateRecord(this.zoneId, remote.id, {
        name,
        type,
        content: decision.newIp,
        ttl: this.record.ttl,
      });
    } catch (error) {
      return this.fail('update', toDdnsError(error));
    }
    this.logger.info(`Updated DNS record ${name} (${type}) to ${decision.newIp}, TTL ${this.record.ttl}`);

    const cacheSaved = await this.writeCache(decision.newIp, cached, this.now());
    return { status: 'updated', previousIp: decision.oldIp, ip: decision.newIp, cacheSaved };
  }

  private async loadCache(): Promise<CacheRecord | undefined> {
    try {
      return await this.cache.load();
    } catch (error) {
      this.logger.warn(`Could not load cache, treating as absent: ${toDdnsError(error).message}`);
      return undefined;
    }
  }

  /**
   * Records the provider-confirmed state. A failed write is only logged: the
   * remote record is already correct and the next cycle falls back to a lookup.
   */
  private async writeCache(ip: string, previous: CacheRecord | undefined, updatedAt: Date | undefined): Promise<boolean> {
    const now = this.now();
    // Keep a slightly-ahead checkedAt; one beyond the skew allowance is discarded.
    const checkedAt =
      previous && previous.checkedAt.getTime() > now.getTime() && !isFromFuture(previous, now)
        ? previous.checkedAt
        : now;

    try {
      await this.cache.save({
        ip,
        checkedAt,
        updatedAt,
        recordName: this.record.name,
        recordType: this.record.type,
      });
      return true;
    } catch (error) {
      this.logger.warn(
        `Could not save cache, next cycle will query ${this.provider.name} again: ${toDdnsError(error).message}`
      );
      return false;
    }
  }

  private describeCacheMiss(reason: CacheCheckReason, cached: CacheRecord | undefined, currentIp: string): string {
    switch (reason) {
      case 'ip changed':
        return `IP changed since last sync: ${cached?.ip} -> ${currentIp}, checking ${this.provider.name}`;
      case 'cache expired':
        return `Cache expired (older than ${this.cacheExpiryMs / 3_600_000}h), checking ${this.provider.name}`;
      case 'record mismatch':
        return `Cache belongs to a different record, checking ${this.provider.name}`;
      case 'cache absent':
        return `No cache, checking ${this.provider.name}`;
    }
  }

  private fail(step: CycleStep, error: DdnsError): CycleOutcome {
    if (error.transient) {
      this.logger.warn(`Cycle failed during ${step}, will retry next cycle: ${error.message}`);
    } else {
      this.logger.error(`Cycle failed during ${step}, operator attention needed: ${error.message}`, {
        code: error.code,
      });
    }
    return { status: 'failed', step, error };
  }
}
