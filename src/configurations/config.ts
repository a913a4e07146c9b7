import dotenv from 'dotenv';
import { z } from 'zod';
import { CLOUDFLARE_API_URL, IP_SERVICE_URLS } from '../constants';
import { ConfigurationError } from '../errors';
import type { LogLevel } from '../logging/Logger';
import { DnsRecordRef, RECORD_TYPES, RecordType } from '../providers/DnsProvider';

dotenv.config();

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const required = (name: string) =>
  z.preprocess(blankToUndefined, z.string({ required_error: `${name} is required` }).trim());

const optionalNumber = (defaultValue: number, schema: z.ZodNumber) =>
  z.preprocess(blankToUndefined, z.coerce.number().pipe(schema).default(defaultValue));

const flag = z.preprocess(
  value => (typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value),
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default('false')
    .transform(value => value === 'true' || value === '1' || value === 'yes')
);

const urlList = z.preprocess(
  blankToUndefined,
  z
    .string()
    .transform(value =>
      value
        .split(',')
        .map(url => url.trim())
        .filter(url => url.length > 0)
    )
    .pipe(z.array(z.string().url()).min(1))
    .optional()
);

const EnvSchema = z.object({
  CLOUDFLARE_API_TOKEN: required('CLOUDFLARE_API_TOKEN'),
  CLOUDFLARE_ZONE_ID: required('CLOUDFLARE_ZONE_ID'),
  DNS_RECORD_NAME: required('DNS_RECORD_NAME'),
  DNS_RECORD_TYPE: z.preprocess(
    value => (typeof value === 'string' ? blankToUndefined(value.toUpperCase()) : value),
    z.enum(RECORD_TYPES).default('A')
  ),
  DNS_RECORD_TTL: optionalNumber(1, z.number().int().min(1)),
  CACHE_EXPIRY_HOURS: optionalNumber(24, z.number().positive()),
  CACHE_PATH: z.preprocess(blankToUndefined, z.string().default('./cache.json')),
  POLL_INTERVAL_SECONDS: optionalNumber(600, z.number().int().positive()),
  RUN_ONCE: flag,
  IP_SERVICE_URLS: urlList,
  HTTP_TIMEOUT_MS: optionalNumber(15_000, z.number().int().positive()),
  CYCLE_TIMEOUT_MS: optionalNumber(300_000, z.number().int().positive()),
  CLOUDFLARE_API_URL: z.preprocess(blankToUndefined, z.string().url().default(CLOUDFLARE_API_URL)),
  LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' ? blankToUndefined(value.toLowerCase()) : value),
    z.enum(['debug', 'info', 'warn', 'error']).default('info')
  ),
});

type Env = Record<string, string | undefined>;

export class Config {
  public readonly CLOUDFLARE_API_TOKEN: string;
  public readonly CLOUDFLARE_ZONE_ID: string;
  public readonly CLOUDFLARE_API_URL: string;

  public readonly DNS_RECORD_NAME: string;
  public readonly DNS_RECORD_TYPE: RecordType;
  public readonly DNS_RECORD_TTL: number;

  public readonly CACHE_EXPIRY_HOURS: number;
  public readonly CACHE_PATH: string;

  public readonly POLL_INTERVAL_SECONDS: number;
  public readonly RUN_ONCE: boolean;
  public readonly CYCLE_TIMEOUT_MS: number;

  public readonly IP_SERVICE_URLS: readonly string[];
  public readonly HTTP_TIMEOUT_MS: number;

  public readonly LOG_LEVEL: LogLevel;

  constructor(env: Env = process.env) {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => {
        const variable = issue.path.join('.');
        return issue.message.startsWith(variable) ? issue.message : `${variable}: ${issue.message}`;
      });
      throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }

    const values = parsed.data;
    this.CLOUDFLARE_API_TOKEN = values.CLOUDFLARE_API_TOKEN;
    this.CLOUDFLARE_ZONE_ID = values.CLOUDFLARE_ZONE_ID;
    this.CLOUDFLARE_API_URL = values.CLOUDFLARE_API_URL.replace(/\/+$/, '');
    this.DNS_RECORD_NAME = values.DNS_RECORD_NAME;
    this.DNS_RECORD_TYPE = values.DNS_RECORD_TYPE;
    this.DNS_RECORD_TTL = values.DNS_RECORD_TTL;
    this.CACHE_EXPIRY_HOURS = values.CACHE_EXPIRY_HOURS;
    this.CACHE_PATH = values.CACHE_PATH;
    this.POLL_INTERVAL_SECONDS = values.POLL_INTERVAL_SECONDS;
    this.RUN_ONCE = values.RUN_ONCE;
    this.CYCLE_TIMEOUT_MS = values.CYCLE_TIMEOUT_MS;
    this.IP_SERVICE_URLS = values.IP_SERVICE_URLS ?? IP_SERVICE_URLS[values.DNS_RECORD_TYPE];
    this.HTTP_TIMEOUT_MS = values.HTTP_TIMEOUT_MS;
    this.LOG_LEVEL = values.LOG_LEVEL;
  }

  public get record(): DnsRecordRef {
    return {
      name: this.DNS_RECORD_NAME,
      type: this.DNS_RECORD_TYPE,
      ttl: this.DNS_RECORD_TTL,
    };
  }

  public get cacheExpiryMs(): number {
    return this.CACHE_EXPIRY_HOURS * 60 * 60 * 1000;
  }
}
