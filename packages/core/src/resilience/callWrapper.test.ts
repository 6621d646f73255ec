import { describe, expect, it, vi } from 'vitest';
import { AuthenticationFailedError, RetriesExhaustedError } from '../errors/index.js';
import { createPolicy, resilientCall, type CallPolicy } from './callWrapper.js';
import type { CallErrorClass } from './classify.js';

class FakeError extends Error {
  constructor(readonly errorClass: CallErrorClass) {
    super(errorClass.kind);
  }
}

const transient = () => new FakeError({ kind: 'transient-network' });
const authLost = () => new FakeError({ kind: 'authentication-lost' });
const fatal = () => new FakeError({ kind: 'fatal' });

function policy(overrides: Partial<CallPolicy> = {}): CallPolicy & { waits: number[] } {
  const waits: number[] = [];
  const base = createPolicy(
    'test-call',
    (error) => (error instanceof FakeError ? error.errorClass : { kind: 'fatal' }),
    {
      maxAttempts: 3,
      initialDelay: 100,
      maxDelay: 1000,
      backoffMultiplier: 2,
      wait: async (ms) => { waits.push(ms); },
    },
    overrides
  );
  return { ...base, waits };
}

describe('resilientCall', () => {
  it('returns the value once a transient failure clears within budget', async () => {
    const call = vi.fn()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce('tracks');
    const p = policy();

    await expect(resilientCall(call, p)).resolves.toBe('tracks');
    expect(call).toHaveBeenCalledTimes(3);
    expect(p.waits).toEqual([100, 200]);
  });

  it('surfaces retries-exhausted when every attempt fails transiently', async () => {
    const call = vi.fn().mockRejectedValue(transient());

    const error = await resilientCall(call, policy()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetriesExhaustedError);
    expect(error).toMatchObject({ kind: 'retries-exhausted', attempts: 3 });
    expect(call).toHaveBeenCalledTimes(3);
  });

  it('waits at least as long as the server asks on rate limits', async () => {
    const call = vi.fn()
      .mockRejectedValueOnce(new FakeError({ kind: 'rate-limited', retryAfterMs: 5000 }))
      .mockResolvedValueOnce(7);
    const p = policy();

    await expect(resilientCall(call, p)).resolves.toBe(7);
    expect(p.waits).toEqual([5000]);
  });

  it('rethrows fatal errors without retrying', async () => {
    const failure = fatal();
    const call = vi.fn().mockRejectedValue(failure);
    const p = policy();

    await expect(resilientCall(call, p)).rejects.toBe(failure);
    expect(call).toHaveBeenCalledTimes(1);
    expect(p.waits).toEqual([]);
  });

  it('re-authenticates exactly once and retries the call', async () => {
    const reauthenticate = vi.fn().mockResolvedValue(undefined);
    const call = vi.fn()
      .mockRejectedValueOnce(authLost())
      .mockResolvedValueOnce('album');

    await expect(resilientCall(call, policy({ reauthenticate }))).resolves.toBe('album');
    expect(reauthenticate).toHaveBeenCalledTimes(1);
    expect(call).toHaveBeenCalledTimes(2);
  });

  it('fails with authentication-failed on a second loss, never re-authenticating twice', async () => {
    const reauthenticate = vi.fn().mockResolvedValue(undefined);
    const call = vi.fn().mockRejectedValue(authLost());

    const error = await resilientCall(call, policy({ reauthenticate })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationFailedError);
    expect(reauthenticate).toHaveBeenCalledTimes(1);
    expect(call).toHaveBeenCalledTimes(2);
  });

  it('fails with authentication-failed when re-authentication itself fails', async () => {
    const reauthenticate = vi.fn().mockRejectedValue(new Error('bad cookie'));
    const call = vi.fn().mockRejectedValue(authLost());

    const error = await resilientCall(call, policy({ reauthenticate })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationFailedError);
    expect(call).toHaveBeenCalledTimes(1);
  });

  it('treats authentication loss as failed when no re-authentication is configured', async () => {
    const call = vi.fn().mockRejectedValue(authLost());

    await expect(resilientCall(call, policy())).rejects.toBeInstanceOf(AuthenticationFailedError);
    expect(call).toHaveBeenCalledTimes(1);
  });

  it('gives the retry after re-authentication its own transient budget', async () => {
    const reauthenticate = vi.fn().mockResolvedValue(undefined);
    const call = vi.fn()
      .mockRejectedValueOnce(authLost())
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce('ok');

    await expect(resilientCall(call, policy({ reauthenticate }))).resolves.toBe('ok');
    expect(call).toHaveBeenCalledTimes(3);
  });
});
