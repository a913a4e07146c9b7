import net from 'net';

/**
 * RFC 5952 text form of an address: IPv6 lowercased with the longest zero run
 * compressed, so `2001:DB8:0:0:0:0:0:1` becomes `2001:db8::1`. IPv4 and
 * anything that is not an address come back trimmed.
 */
export const canonicalAddress = (address: string): string => {
  const trimmed = address.trim();
  if (!net.isIPv6(trimmed) || trimmed.includes('%')) return trimmed.toLowerCase();

  return new URL(`http://[${trimmed}]/`).hostname.slice(1, -1);
};
