/**
 * Error types
 *
 * Everything the session layer raises internally extends GrowLinkError.
 * Only ConfigError is allowed to reach the caller (at startup); transport
 * and fallback failures are absorbed by the coordinator and surfaced
 * through its status.
 */

export class GrowLinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GrowLinkError';
  }
}

/** Connection refused, reset, timed out, or a non-2xx fallback response */
export class TransportError extends GrowLinkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** A whole fallback round produced no values */
export class FallbackFetchError extends GrowLinkError {
  readonly failedKeys: string[];

  constructor(message: string, failedKeys: string[], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FallbackFetchError';
    this.failedKeys = failedKeys;
  }
}

/** Invalid or unreadable configuration file */
export class ConfigError extends GrowLinkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** Message of an unknown thrown value, for log fields */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
