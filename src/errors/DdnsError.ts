export type DdnsErrorCode =
  | 'NETWORK'
  | 'PARSE'
  | 'AUTH'
  | 'NOT_FOUND'
  | 'RATE_LIMIT'
  | 'PROVIDER'
  | 'IO'
  | 'CONFIG';

/**
 * Base class for every failure a reconciliation cycle can report.
 * `transient` failures are left to the next scheduled cycle; the others need an operator.
 */
export abstract class DdnsError extends Error {
  public abstract readonly code: DdnsErrorCode;
  public abstract readonly transient: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NetworkError extends DdnsError {
  public readonly code = 'NETWORK';
  public readonly transient = true;
}

export class ParseError extends DdnsError {
  public readonly code = 'PARSE';
  public readonly transient = true;
}

export class AuthError extends DdnsError {
  public readonly code = 'AUTH';
  public readonly transient = false;

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class NotFoundError extends DdnsError {
  public readonly code = 'NOT_FOUND';
  public readonly transient = false;
}

export class RateLimitError extends DdnsError {
  public readonly code = 'RATE_LIMIT';
  public readonly transient = true;

  constructor(
    message: string,
    public readonly retryAfterSeconds?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ProviderError extends DdnsError {
  public readonly code = 'PROVIDER';
  public readonly transient = true;

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class IOError extends DdnsError {
  public readonly code = 'IO';
  public readonly transient = false;
}

export class ConfigurationError extends DdnsError {
  public readonly code = 'CONFIG';
  public readonly transient = false;

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Normalizes anything caught at a cycle boundary. Values that are already a
 * DdnsError pass through untouched.
 */
export const toDdnsError = (
  error: unknown,
  fallback: (message: string, options: { cause: unknown }) => DdnsError = (message, options) =>
    new ProviderError(message, undefined, options)
): DdnsError => {
  if (error instanceof DdnsError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return fallback(message, { cause: error });
};
