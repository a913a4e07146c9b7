import net from 'net';
import { z } from 'zod';
import { DdnsError, NetworkError, ParseError } from '../errors';
import { Logger } from '../logging/Logger';
import { canonicalAddress } from './address';
import { AddressFamily, IpResolver } from './IpResolver';

const IpBody = z.object({ ip: z.string() });

export interface HttpIpResolverOptions {
  endpoints: readonly string[];
  family: AddressFamily;
  timeoutMs: number;
}

/**
 * Asks address-reflection services for the public address. Endpoints are
 * tried in order; a later one is only asked when an earlier one failed.
 */
export class HttpIpResolver implements IpResolver {
  private readonly endpoints: readonly string[];
  private readonly family: AddressFamily;
  private readonly timeoutMs: number;

  constructor(
    options: HttpIpResolverOptions,
    private readonly logger: Logger
  ) {
    if (options.endpoints.length === 0) {
      throw new Error('HttpIpResolver: at least one endpoint is required');
    }
    this.endpoints = options.endpoints;
    this.family = options.family;
    this.timeoutMs = options.timeoutMs;
  }

  public async resolve(): Promise<string> {
    let lastError: DdnsError | undefined;

    for (const endpoint of this.endpoints) {
      try {
        return await this.resolveFrom(endpoint);
      } catch (error) {
        lastError =
          error instanceof DdnsError
            ? error
            : new NetworkError(`${endpoint}: ${String(error)}`, { cause: error });
        this.logger.warn(`IP lookup via ${endpoint} failed: ${lastError.message}`);
      }
    }

    throw lastError ?? new NetworkError('No IP service endpoints configured');
  }

  private async resolveFrom(endpoint: string): Promise<string> {
    let body: string;
    try {
      const res = await fetch(endpoint, {
        headers: { Accept: 'application/json, text/plain' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!res.ok) {
        throw new NetworkError(`${endpoint} responded with HTTP ${res.status}`);
      }
      body = await res.text();
    } catch (error) {
      if (error instanceof DdnsError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`${endpoint} unreachable: ${reason}`, { cause: error });
    }

    return this.parseAddress(endpoint, body);
  }

  private parseAddress(endpoint: string, body: string): string {
    const candidate = extractAddress(body);
    const version = net.isIP(candidate);

    if (version === 0) {
      throw new ParseError(`${endpoint} returned something that is not an IP address: ${JSON.stringify(truncate(candidate))}`);
    }

    const expected = this.family === 'ipv4' ? 4 : 6;
    if (version !== expected) {
      throw new ParseError(`${endpoint} returned an IPv${version} address (${candidate}), expected IPv${expected}`);
    }

    return canonicalAddress(candidate);
  }
}

const extractAddress = (body: string): string => {
  const trimmed = body.trim();
  if (!trimmed.startsWith('{')) return trimmed;

  try {
    const parsed = IpBody.safeParse(JSON.parse(trimmed));
    return parsed.success ? parsed.data.ip.trim() : trimmed;
  } catch {
    return trimmed;
  }
};

const truncate = (value: string, max = 64): string =>
  value.length > max ? `${value.slice(0, max)}…` : value;
