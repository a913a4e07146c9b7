export type AddressFamily = 'ipv4' | 'ipv6';

export interface IpResolver {
  /** Resolves to the canonical public address. Rejects with NetworkError or ParseError. */
  resolve(): Promise<string>;
}
