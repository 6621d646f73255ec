/**
 * Resilient Call Wrapper
 *
 * Runs one external call under an explicit policy:
 * - transient network failures and rate limits back off and retry until the
 *   attempt budget is spent, then surface RetriesExhaustedError
 * - an authentication loss triggers exactly one re-authentication followed by
 *   one more run of the call; a second loss surfaces AuthenticationFailedError
 * - anything else is rethrown untouched on the first failure
 *
 * The operation is re-invoked on every attempt, so a closure that reads the
 * current client from a SessionCell picks up the replacement installed by
 * re-authentication.
 */

import { retry, type Logger } from '@tunegrab/utils';
import { AuthenticationFailedError, RetriesExhaustedError, describeError } from '../errors/index.js';
import { isRetryable, type ErrorClassifier } from './classify.js';

export interface CallPolicy {
  /** Label used in logs and error messages */
  name: string;
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  classify: ErrorClassifier;
  /** Re-establish the session; absent means authentication loss is fatal */
  reauthenticate?: () => Promise<void>;
  logger?: Logger;
  wait?: (ms: number) => Promise<void>;
}

export type PolicyDefaults = Omit<CallPolicy, 'name' | 'classify'>;

/**
 * Derive a named policy for one call site from shared defaults
 */
export function createPolicy(
  name: string,
  classify: ErrorClassifier,
  defaults: PolicyDefaults,
  overrides: Partial<CallPolicy> = {}
): CallPolicy {
  return { ...defaults, name, classify, ...overrides };
}

class AuthenticationLost extends Error {
  constructor(readonly original: unknown) {
    super('authentication lost');
  }
}

async function runWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: CallPolicy
): Promise<T> {
  let attempts = 0;
  try {
    return await retry(
      (attempt) => {
        attempts = attempt;
        return operation(attempt);
      },
      {
        maxAttempts: policy.maxAttempts,
        initialDelay: policy.initialDelay,
        maxDelay: policy.maxDelay,
        backoffMultiplier: policy.backoffMultiplier,
        wait: policy.wait,
        retryIf: (error) => isRetryable(policy.classify(error)),
        delayFor: (error, _attempt, backoff) => {
          const retryAfterMs = policy.classify(error).retryAfterMs;
          return retryAfterMs !== undefined ? Math.max(retryAfterMs, backoff) : backoff;
        },
        onRetry: (error, attempt, delay) => {
          policy.logger?.warn(
            { call: policy.name, attempt, maxAttempts: policy.maxAttempts, delay, reason: describeError(error) },
            'External call failed, retrying'
          );
        },
      }
    );
  } catch (error) {
    const errorClass = policy.classify(error);
    if (isRetryable(errorClass)) {
      throw new RetriesExhaustedError(policy.name, attempts, error);
    }
    if (errorClass.kind === 'authentication-lost') {
      throw new AuthenticationLost(error);
    }
    throw error;
  }
}

/**
 * Execute `operation` under `policy`
 */
export async function resilientCall<T>(
  operation: (attempt: number) => Promise<T>,
  policy: CallPolicy
): Promise<T> {
  try {
    return await runWithBackoff(operation, policy);
  } catch (error) {
    if (!(error instanceof AuthenticationLost)) {
      throw error;
    }

    if (!policy.reauthenticate) {
      throw new AuthenticationFailedError(policy.name, error.original);
    }

    policy.logger?.warn({ call: policy.name, reason: describeError(error.original) }, 'Authentication lost, re-authenticating once');
    try {
      await policy.reauthenticate();
    } catch (reauthError) {
      policy.logger?.error({ call: policy.name, err: reauthError }, 'Re-authentication failed');
      throw new AuthenticationFailedError(policy.name, reauthError);
    }
  }

  try {
    return await runWithBackoff(operation, policy);
  } catch (error) {
    if (error instanceof AuthenticationLost) {
      throw new AuthenticationFailedError(policy.name, error.original);
    }
    throw error;
  }
}
