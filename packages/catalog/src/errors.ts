/**
 * Catalog Errors
 */

import {
  TuneGrabError,
  errorChain,
  isNetworkError,
  type CallErrorClass,
  type FailureKind,
} from '@tunegrab/core';

/**
 * The catalog answered with a non-2xx status
 */
export class CatalogHttpError extends TuneGrabError {
  public readonly status: number;
  public readonly retryAfterMs?: number;

  constructor(endpoint: string, status: number, body: string, retryAfterMs?: number) {
    super(
      `Catalog ${endpoint} request failed: HTTP ${status}`,
      'CATALOG_HTTP_ERROR',
      statusKind(status),
      { endpoint, status, body: body.substring(0, 500) }
    );
    this.name = 'CatalogHttpError';
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }
}

function statusKind(status: number): FailureKind {
  if (status === 401 || status === 403) return 'authentication-lost';
  if (status === 429) return 'rate-limited';
  if (status === 408 || status >= 500) return 'transient-network';
  return 'fatal';
}

/**
 * Classifier for catalog calls made through the resilient call wrapper
 */
export function classifyCatalogError(error: unknown): CallErrorClass {
  for (const link of errorChain(error)) {
    if (link instanceof CatalogHttpError) {
      const kind = statusKind(link.status);
      switch (kind) {
        case 'authentication-lost':
          return { kind };
        case 'rate-limited':
          return { kind, retryAfterMs: link.retryAfterMs };
        case 'transient-network':
          return { kind };
        default:
          return { kind: 'fatal' };
      }
    }
  }

  if (isNetworkError(error)) {
    return { kind: 'transient-network' };
  }
  return { kind: 'fatal' };
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}
