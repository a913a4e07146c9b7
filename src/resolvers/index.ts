export * from './IpResolver';
export * from './HttpIpResolver';
export * from './address';
