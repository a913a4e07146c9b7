import { afterAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { AuthError, NetworkError, NotFoundError, ParseError, ProviderError, RateLimitError } from '../src/errors';
import { Logger } from '../src/logging/Logger';
import { CloudflareClient } from '../src/providers';
import { createTestLogger, jsonResponse } from './utils';

const mockFetch = vi.fn<typeof fetch>();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

const cfResponse = (result: unknown, extra: Record<string, unknown> = {}) =>
  jsonResponse({ success: true, errors: [], messages: [], result, ...extra });

const cfError = (status: number, errors: { code: number; message: string }[], headers: Record<string, string> = {}) =>
  jsonResponse({ success: false, errors, messages: [], result: null }, { status, headers });

const record = (overrides: Record<string, unknown> = {}) => ({
  id: 'rec-1',
  type: 'A',
  name: 'home.example.com',
  content: '198.51.100.123',
  ttl: 1,
  proxied: false,
  ...overrides,
});

describe('CloudflareClient', () => {
  let logger: Logger;
  let client: CloudflareClient;

  beforeEach(() => {
    logger = createTestLogger();
    client = new CloudflareClient({ apiToken: 'test-token', timeoutMs: 1000 }, logger);
  });

  it('throws if apiToken is missing', () => {
    expect(() => new CloudflareClient({ apiToken: '', timeoutMs: 1000 }, logger)).toThrow('apiToken is required');
  });

  describe('findRecord', () => {
    it('queries records by name and type with a bearer token', async () => {
      mockFetch.mockResolvedValueOnce(cfResponse([record()]));

      const found = await client.findRecord('zone-1', 'home.example.com', 'A');

      expect(found).toEqual({ id: 'rec-1', type: 'A', name: 'home.example.com', content: '198.51.100.123', ttl: 1 });

      const [url, init] = mockFetch.mock.calls[0] ?? [];
      expect(url).toBe('https://api.cloudflare.com/client/v4/zones/zone-1/dns_records?name=home.example.com&type=A');
      const headers = new Headers(init?.headers);
      expect(headers.get('Authorization')).toBe('Bearer test-token');
      expect(headers.get('Content-Type')).toBe('application/json');
      expect(init?.method).toBe('GET');
    });

    it('ignores records of another type or name', async () => {
      mockFetch.mockResolvedValueOnce(
        cfResponse([
          record({ id: 'rec-aaaa', type: 'AAAA', content: '2001:db8::1' }),
          record({ id: 'rec-other', name: 'other.example.com' }),
          record({ id: 'rec-a', name: 'Home.Example.com.' }),
        ])
      );

      const found = await client.findRecord('zone-1', 'home.example.com', 'A');

      expect(found.id).toBe('rec-a');
    });

    it('fails with NotFoundError when no record matches', async () => {
      mockFetch.mockResolvedValueOnce(cfResponse([]));

      await expect(client.findRecord('zone-1', 'home.example.com', 'A')).rejects.toThrow(
        new NotFoundError("No A record named 'home.example.com' in zone zone-1")
      );
    });

    it('fails with NotFoundError when the name is ambiguous', async () => {
      mockFetch.mockResolvedValueOnce(cfResponse([record({ id: 'r1' }), record({ id: 'r2' })]));

      const promise = client.findRecord('zone-1', 'home.example.com', 'A');

      await expect(promise).rejects.toBeInstanceOf(NotFoundError);
      await expect(promise).rejects.toThrow("2 A records named 'home.example.com' in zone zone-1, refusing to pick one");
    });

    it('logs messages returned by the API', async () => {
      mockFetch.mockResolvedValueOnce(cfResponse([record()], { messages: [{ code: 10000, message: 'token expires soon' }] }));

      await client.findRecord('zone-1', 'home.example.com', 'A');

      expect(logger.info).toHaveBeenCalledWith('Cloudflare messages: token expires soon');
    });
  });

  describe('updateRecord', () => {
    it('patches the new content and ttl', async () => {
      mockFetch.mockResolvedValueOnce(cfResponse(record({ content: '203.0.113.42', ttl: 300 })));

      const updated = await client.updateRecord('zone-1', 'rec-1', {
        name: 'home.example.com',
        type: 'A',
        content: '203.0.113.42',
        ttl: 300,
      });

      expect(updated.content).toBe('203.0.113.42');
      expect(mockFetch).toHaveBeenCalledWith(
        'https://api.cloudflare.com/client/v4/zones/zone-1/dns_records/rec-1',
        expect.objectContaining({
          method: 'PATCH',
          body: JSON.stringify({ type: 'A', name: 'home.example.com', content: '203.0.113.42', ttl: 300 }),
        })
      );
    });

    it('uses a custom base url', async () => {
      const local = new CloudflareClient({ apiToken: 'test-token', baseUrl: 'http://127.0.0.1:8787/v4/', timeoutMs: 1000 }, logger);
      mockFetch.mockResolvedValueOnce(cfResponse(record()));

      await local.updateRecord('zone-1', 'rec-1', { name: 'home.example.com', type: 'A', content: '198.51.100.123', ttl: 1 });

      expect(mockFetch.mock.calls[0]?.[0]).toBe('http://127.0.0.1:8787/v4/zones/zone-1/dns_records/rec-1');
    });
  });

  describe('error mapping', () => {
    const update = () =>
      client.updateRecord('zone-1', 'rec-1', { name: 'home.example.com', type: 'A', content: '203.0.113.42', ttl: 1 });

    it('maps 401 and 403 to AuthError', async () => {
      mockFetch.mockResolvedValueOnce(cfError(403, [{ code: 9109, message: 'Unauthorized to access requested resource' }]));

      const promise = update();

      await expect(promise).rejects.toBeInstanceOf(AuthError);
      await expect(promise).rejects.toThrow('Cloudflare API error 403: 9109: Unauthorized to access requested resource');
    });

    it('maps 429 to RateLimitError with Retry-After', async () => {
      mockFetch.mockResolvedValueOnce(cfError(429, [{ code: 971, message: 'Please wait' }], { 'Retry-After': '30' }));

      const error = await update().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({ retryAfterSeconds: 30, transient: true });
    });

    it('maps other non-2xx responses to ProviderError', async () => {
      mockFetch.mockResolvedValueOnce(new Response('upstream timeout', { status: 504 }));

      const error = await update().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ status: 504, message: 'Cloudflare API error 504: upstream timeout' });
    });

    it('maps success: false to ProviderError with error details', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ success: false, errors: [{ code: 1004, message: 'DNS Validation Error' }], messages: [], result: null })
      );

      await expect(update()).rejects.toThrow(new ProviderError('Cloudflare API error: 1004: DNS Validation Error'));
    });

    it('maps connection failures to NetworkError', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(update()).rejects.toThrow(new NetworkError('Cloudflare API unreachable: fetch failed'));
    });

    it('maps a body that is not an envelope to ParseError', async () => {
      mockFetch.mockResolvedValueOnce(new Response('<html>maintenance</html>', { status: 200 }));

      await expect(update()).rejects.toBeInstanceOf(ParseError);
    });

    it('maps an unexpected result shape to ParseError', async () => {
      mockFetch.mockResolvedValueOnce(cfResponse({ id: 'rec-1' }));

      await expect(update()).rejects.toBeInstanceOf(ParseError);
    });
  });
});
