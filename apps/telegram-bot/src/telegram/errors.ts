/**
 * Telegram Error Classification
 */

import { GrammyError, HttpError } from 'grammy';
import { errorChain, isNetworkError, type CallErrorClass } from '@tunegrab/core';

const NOT_MODIFIED_RE = /message is not modified/i;

/**
 * Classifier for Bot API calls made through the resilient call wrapper
 */
export function classifyTelegramError(error: unknown): CallErrorClass {
  for (const link of errorChain(error)) {
    if (link instanceof GrammyError) {
      if (link.error_code === 429) {
        const retryAfter = link.parameters.retry_after;
        return retryAfter !== undefined
          ? { kind: 'rate-limited', retryAfterMs: retryAfter * 1000 }
          : { kind: 'rate-limited' };
      }
      if (link.error_code >= 500) {
        return { kind: 'transient-network' };
      }
      return { kind: 'fatal' };
    }
    if (link instanceof HttpError) {
      return { kind: 'transient-network' };
    }
  }

  if (isNetworkError(error)) {
    return { kind: 'transient-network' };
  }
  return { kind: 'fatal' };
}

/**
 * Telegram rejects an edit that leaves the text as it was
 */
export function isNotModifiedError(error: unknown): boolean {
  return error instanceof GrammyError && error.error_code === 400 && NOT_MODIFIED_RE.test(error.description);
}
