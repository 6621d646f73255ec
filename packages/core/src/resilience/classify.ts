/**
 * Shared helpers for turning arbitrary thrown values into call outcomes.
 */

import { isObject } from '@tunegrab/utils';

export type CallErrorKind =
  | 'transient-network'
  | 'rate-limited'
  | 'authentication-lost'
  | 'fatal';

export interface CallErrorClass {
  kind: CallErrorKind;
  /** Server-mandated wait before the next attempt */
  retryAfterMs?: number;
}

export type ErrorClassifier = (error: unknown) => CallErrorClass;

const NETWORK_ERROR_CODES = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const NETWORK_TEXT_RE =
  /timed?\s*out|connection\s*reset|fetch failed|socket hang up|network\s*error|getaddrinfo|temporarily unavailable/i;

type UnknownRecord = Record<string, unknown>;

/**
 * Walk an error and the errors it wraps (cause, error)
 */
export function errorChain(error: unknown): UnknownRecord[] {
  const chain: UnknownRecord[] = [];
  const queue: unknown[] = [error];
  const seen = new Set<unknown>();

  while (queue.length > 0) {
    const item = queue.shift();
    if (!item || seen.has(item)) {
      continue;
    }
    seen.add(item);

    if (!isObject(item)) {
      continue;
    }
    chain.push(item);

    for (const nested of [item['cause'], item['error']]) {
      if (nested && typeof nested === 'object') {
        queue.push(nested);
      }
    }
  }

  return chain;
}

/**
 * Connection resets, DNS hiccups, socket and request timeouts
 */
export function isNetworkError(error: unknown): boolean {
  for (const record of errorChain(error)) {
    const code = typeof record['code'] === 'string' ? record['code'].toUpperCase() : undefined;
    if (code && NETWORK_ERROR_CODES.has(code)) {
      return true;
    }
    if (record['name'] === 'TimeoutError' || record['name'] === 'AbortError') {
      return true;
    }
    const message = typeof record['message'] === 'string' ? record['message'] : '';
    if (message && NETWORK_TEXT_RE.test(message)) {
      return true;
    }
  }
  return false;
}

export function isRetryable(errorClass: CallErrorClass): boolean {
  return errorClass.kind === 'transient-network' || errorClass.kind === 'rate-limited';
}
