import { vi } from 'vitest';
import { Config } from '../src/configurations';
import { Logger } from '../src/logging/Logger';
import { DnsProvider, ProviderRecord, RecordType, RecordUpdate } from '../src/providers';
import { IpResolver } from '../src/resolvers';

export const TEST_ENV: Record<string, string> = {
  CLOUDFLARE_API_TOKEN: 'test-token',
  CLOUDFLARE_ZONE_ID: 'zone-1',
  DNS_RECORD_NAME: 'home.example.com',
};

export const createTestConfig = (overrides: Record<string, string | undefined> = {}): Config =>
  new Config({ ...TEST_ENV, ...overrides });

export const createTestLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

export class StubResolver implements IpResolver {
  public resolve = vi.fn<() => Promise<string>>();

  constructor(ip?: string) {
    if (ip) this.resolve.mockResolvedValue(ip);
  }
}

/** Provider double holding one record in memory */
export class FakeProvider implements DnsProvider {
  public readonly name = 'fake';
  public record: ProviderRecord;

  public findRecord = vi.fn(async (_zoneId: string, _name: string, _type: RecordType): Promise<ProviderRecord> => ({
    ...this.record,
  }));

  public updateRecord = vi.fn(
    async (_zoneId: string, recordId: string, update: RecordUpdate): Promise<ProviderRecord> => {
      this.record = { id: recordId, ...update };
      return { ...this.record };
    }
  );

  constructor(content: string, type: RecordType = 'A') {
    this.record = { id: 'rec-1', name: 'home.example.com', type, content, ttl: 1 };
  }
}

export const jsonResponse = (body: unknown, init: ResponseInit = {}): Response =>
  new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
