import { describe, expect, it, vi } from 'vitest';
import { backoffDelay, retry } from './retry.js';

const noWait = () => Promise.resolve();

describe('retry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    await expect(retry(fn, { maxAttempts: 3, wait: noWait })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenNthCalledWith(2, 2);
  });

  it('rethrows the last error once attempts run out', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('down'));

    await expect(retry(fn, { maxAttempts: 3, wait: noWait })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops immediately when retryIf rejects the error', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('bad input'));

    await expect(
      retry(fn, { maxAttempts: 5, wait: noWait, retryIf: () => false })
    ).rejects.toThrow('bad input');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('waits with capped exponential backoff', async () => {
    const waits: number[] = [];
    const fn = vi.fn().mockRejectedValue(new Error('down'));

    await expect(
      retry(fn, {
        maxAttempts: 5,
        initialDelay: 100,
        maxDelay: 300,
        backoffMultiplier: 2,
        wait: async (ms) => { waits.push(ms); },
      })
    ).rejects.toThrow('down');

    expect(waits).toEqual([100, 200, 300, 300]);
  });

  it('lets delayFor override the backoff', async () => {
    const waits: number[] = [];
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('slow down'))
      .mockResolvedValueOnce(1);

    await retry(fn, {
      maxAttempts: 2,
      delayFor: () => 4200,
      wait: async (ms) => { waits.push(ms); },
    });

    expect(waits).toEqual([4200]);
  });
});

describe('backoffDelay', () => {
  it('grows with the attempt number up to the ceiling', () => {
    const opts = { initialDelay: 500, maxDelay: 3000, backoffMultiplier: 2 };
    expect(backoffDelay(1, opts)).toBe(500);
    expect(backoffDelay(3, opts)).toBe(2000);
    expect(backoffDelay(4, opts)).toBe(3000);
  });
});
