import { describe, it, expect, jest } from '@jest/globals';
import { withExponentialBackoff } from '../retry';

describe('withExponentialBackoff', () => {
  it('retries until the call succeeds', async () => {
    const delays: number[] = [];
    const fn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ok');

    const result = await withExponentialBackoff(fn, {
      maxAttempts: 3,
      baseDelayMs: 100,
      sleepFn: async ms => {
        delays.push(ms);
      },
    });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toHaveLength(2);
    expect(delays[0]).toBeGreaterThanOrEqual(100);
    expect(delays[0]).toBeLessThan(111);
    expect(delays[1]).toBeGreaterThanOrEqual(200);
    expect(delays[1]).toBeLessThan(221);
  });

  it('rethrows the last error after the final attempt', async () => {
    const onRetry = jest.fn();
    const fn = jest.fn<() => Promise<string>>().mockRejectedValue(new Error('down'));

    await expect(
      withExponentialBackoff(fn, { maxAttempts: 2, onRetry, sleepFn: async () => undefined })
    ).rejects.toThrow('down');
    expect(onRetry).toHaveBeenCalledTimes(1);
  });
});
