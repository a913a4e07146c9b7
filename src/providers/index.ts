export * from './DnsProvider';
export * from './CloudflareClient';
