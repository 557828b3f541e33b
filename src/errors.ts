/**
 * Raised when required settings are missing or point at something unusable.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when a client secret cannot be produced from the configured key.
 */
export class SigningError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SigningError';
  }
}

/**
 * Raised when the token endpoint cannot be reached or does not return a usable token.
 * `status` is null when no HTTP response was received.
 */
export class AuthExchangeError extends Error {
  public readonly status: number | null;
  public readonly body: string;

  constructor(status: number | null, body: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AuthExchangeError';
    this.status = status;
    this.body = body;
  }
}

/**
 * A cache entry that could not be read or decoded. Never thrown out of the
 * auth pipeline; the entry is treated as a miss.
 */
export class CacheReadError extends Error {
  public readonly key: string;

  constructor(key: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CacheReadError';
    this.key = key;
  }
}
