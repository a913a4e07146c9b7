import { z } from 'zod';
import { CLOUDFLARE_API_URL } from '../constants';
import { AuthError, DdnsError, NetworkError, NotFoundError, ParseError, ProviderError, RateLimitError } from '../errors';
import { Logger } from '../logging/Logger';
import { DnsProvider, ProviderRecord, RecordType, RecordUpdate } from './DnsProvider';

export interface CloudflareClientOptions {
  apiToken: string;
  /** Defaults to the public v4 API */
  baseUrl?: string;
  timeoutMs: number;
}

const CloudflareMessage = z.union([
  z.string(),
  z.object({ code: z.number().optional(), message: z.string() }).transform(m => m.message),
]);

const CloudflareEnvelope = z.object({
  success: z.boolean(),
  errors: z.array(z.object({ code: z.number(), message: z.string() })).default([]),
  messages: z.array(CloudflareMessage).default([]),
  result: z.unknown().optional(),
});

const CloudflareDnsRecord = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string(),
  content: z.string(),
  ttl: z.number(),
});

type CloudflareDnsRecord = z.infer<typeof CloudflareDnsRecord>;

/**
 * Cloudflare v4 DNS records client.
 *
 * https://developers.cloudflare.com/api/resources/dns/subresources/records/
 */
export class CloudflareClient implements DnsProvider {
  public readonly name = 'cloudflare';

  private readonly apiToken: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    options: CloudflareClientOptions,
    private readonly logger: Logger
  ) {
    if (!options.apiToken) {
      throw new Error('Cloudflare: apiToken is required');
    }
    this.apiToken = options.apiToken;
    this.baseUrl = (options.baseUrl ?? CLOUDFLARE_API_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
  }

  public async findRecord(zoneId: string, name: string, type: RecordType): Promise<ProviderRecord> {
    const query = new URLSearchParams({ name, type });
    const result = await this.request(
      `/zones/${encodeURIComponent(zoneId)}/dns_records?${query.toString()}`,
      { method: 'GET' },
      z.array(CloudflareDnsRecord)
    );

    const wanted = normalizeName(name);
    const matches = result.filter(r => normalizeName(r.name) === wanted && r.type.toUpperCase() === type);

    if (matches.length === 0) {
      throw new NotFoundError(`No ${type} record named '${name}' in zone ${zoneId}`);
    }
    if (matches.length > 1) {
      throw new NotFoundError(
        `${matches.length} ${type} records named '${name}' in zone ${zoneId}, refusing to pick one`
      );
    }

    return toProviderRecord(matches[0]);
  }

  /** PATCH, so proxied status, comment and tags set in the dashboard survive the update. */
  public async updateRecord(zoneId: string, recordId: string, update: RecordUpdate): Promise<ProviderRecord> {
    const result = await this.request(
      `/zones/${encodeURIComponent(zoneId)}/dns_records/${encodeURIComponent(recordId)}`,
      {
        method: 'PATCH',
        body: JSON.stringify({
          type: update.type,
          name: update.name,
          content: update.content,
          ttl: update.ttl,
        }),
      },
      CloudflareDnsRecord
    );

    return toProviderRecord(result);
  }

  private async request<S extends z.ZodTypeAny>(path: string, init: RequestInit, schema: S): Promise<z.infer<S>> {
    const headers = new Headers(init.headers);
    headers.set('Authorization', `Bearer ${this.apiToken}`);
    headers.set('Content-Type', 'application/json');

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, {
        ...init,
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Cloudflare API unreachable: ${reason}`, { cause: error });
    }

    let text: string;
    try {
      text = await res.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Cloudflare API response interrupted: ${reason}`, { cause: error });
    }

    const envelope = parseEnvelope(text);

    if (!res.ok) {
      throw httpError(res, envelope ? describeErrors(envelope.errors) : text.trim());
    }

    if (!envelope) {
      throw new ParseError(`Cloudflare API returned a body that is not a JSON envelope (HTTP ${res.status})`);
    }

    if (envelope.messages.length > 0) {
      this.logger.info(`Cloudflare messages: ${envelope.messages.join('; ')}`);
    }

    if (!envelope.success) {
      throw new ProviderError(`Cloudflare API error: ${describeErrors(envelope.errors)}`, res.status);
    }

    const result = schema.safeParse(envelope.result);
    if (!result.success) {
      throw new ParseError(`Cloudflare API returned an unexpected result: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
    return result.data;
  }
}

type Envelope = z.infer<typeof CloudflareEnvelope>;

const parseEnvelope = (text: string): Envelope | undefined => {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = CloudflareEnvelope.safeParse(data);
  return parsed.success ? parsed.data : undefined;
};

const describeErrors = (errors: Envelope['errors']): string =>
  errors.length > 0 ? errors.map(e => `${e.code}: ${e.message}`).join(', ') : 'unknown error';

const httpError = (res: Response, details: string): DdnsError => {
  const message = `Cloudflare API error ${res.status}${details ? `: ${details}` : ''}`;

  if (res.status === 401 || res.status === 403) {
    return new AuthError(message, res.status);
  }
  if (res.status === 429) {
    const retryAfter = Number(res.headers.get('Retry-After'));
    return new RateLimitError(message, Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter : undefined);
  }
  return new ProviderError(message, res.status);
};

const normalizeName = (name: string): string => name.trim().toLowerCase().replace(/\.$/, '');

const toProviderRecord = (record: CloudflareDnsRecord): ProviderRecord => ({
  id: record.id,
  name: record.name,
  type: record.type,
  content: record.content,
  ttl: record.ttl,
});
