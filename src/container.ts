import { asFunction, asValue, createContainer, InjectionMode } from 'awilix';
import { ReconcileLoop } from './bootstrap';
import { Config } from './configurations';
import { ConsoleLogger, Logger } from './logging';
import { CloudflareClient, DnsProvider } from './providers';
import { RecordReconciler } from './reconciler';
import { HttpIpResolver, IpResolver } from './resolvers';
import { CacheStoreFactory, ICacheStore } from './store';

export interface Cradle {
  config: Config;
  logger: Logger;
  resolver: IpResolver;
  cacheStore: ICacheStore;
  provider: DnsProvider;
  reconciler: RecordReconciler;
  reconcileLoop: ReconcileLoop;
}

export const createAppContainer = (config: Config = new Config()) => {
  const container = createContainer<Cradle>({ injectionMode: InjectionMode.PROXY });

  container.register({
    config: asValue(config),
    logger: asFunction(({ config }: Cradle) => new ConsoleLogger(config.LOG_LEVEL)).singleton(),
    resolver: asFunction(
      ({ config, logger }: Cradle) =>
        new HttpIpResolver(
          {
            endpoints: config.IP_SERVICE_URLS,
            family: config.DNS_RECORD_TYPE === 'AAAA' ? 'ipv6' : 'ipv4',
            timeoutMs: config.HTTP_TIMEOUT_MS,
          },
          logger
        )
    ).singleton(),
    cacheStore: asFunction(({ config, logger }: Cradle) => CacheStoreFactory.create(config, logger)).singleton(),
    provider: asFunction(
      ({ config, logger }: Cradle) =>
        new CloudflareClient(
          {
            apiToken: config.CLOUDFLARE_API_TOKEN,
            baseUrl: config.CLOUDFLARE_API_URL,
            timeoutMs: config.HTTP_TIMEOUT_MS,
          },
          logger
        )
    ).singleton(),
    reconciler: asFunction(
      ({ config, resolver, cacheStore, provider, logger }: Cradle) =>
        new RecordReconciler(resolver, cacheStore, provider, logger, {
          zoneId: config.CLOUDFLARE_ZONE_ID,
          record: config.record,
          cacheExpiryMs: config.cacheExpiryMs,
        })
    ).singleton(),
    reconcileLoop: asFunction(
      ({ config, reconciler, logger }: Cradle) =>
        new ReconcileLoop(reconciler, logger, {
          pollIntervalMs: config.POLL_INTERVAL_SECONDS * 1000,
          cycleTimeoutMs: config.CYCLE_TIMEOUT_MS,
        })
    ).singleton(),
  });

  return container;
};
