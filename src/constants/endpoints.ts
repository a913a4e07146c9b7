import type { RecordType } from '../providers/DnsProvider';

export const CLOUDFLARE_API_URL = 'https://api.cloudflare.com/client/v4';

/** Address-reflection services, tried in order until one answers. */
export const IP_SERVICE_URLS: Record<RecordType, readonly string[]> = {
  A: ['https://api.ipify.org?format=json', 'https://ipinfo.io/ip'],
  AAAA: ['https://api6.ipify.org?format=json', 'https://v6.ident.me'],
};
