import { describe, it, expect, vi } from 'vitest';
import fc from 'fast-check';
import { RetryExhaustedError, RetryPolicy } from './retry-policy.js';
import { AuthError, NetworkError, RateLimitedError } from '../../errors/trading-errors.js';

function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

describe('RetryPolicy', () => {
  describe('Backoff Schedule', () => {
    it('should wait 1s, 2s, 4s, 8s and 16s before each reconnect attempt', async () => {
      const { delays, sleep } = recordingSleep();
      const policy = RetryPolicy.reconnect({ sleep });
      const operation = vi.fn().mockRejectedValue(new NetworkError('unreachable'));

      await expect(
        policy.execute(operation, { backoffBeforeFirstAttempt: true })
      ).rejects.toBeInstanceOf(RetryExhaustedError);

      expect(operation).toHaveBeenCalledTimes(5);
      expect(delays).toEqual([1000, 2000, 4000, 8000, 16000]);
    });

    it('should only wait between attempts by default', async () => {
      const { delays, sleep } = recordingSleep();
      const policy = new RetryPolicy({
        maxAttempts: 3,
        baseDelayMs: 100,
        maxDelayMs: 1000,
        jitterFactor: 0,
        sleep,
      });
      let attempts = 0;

      const result = await policy.execute(async () => {
        attempts++;
        if (attempts < 3) {
          throw new NetworkError('reset');
        }
        return 'ok';
      });

      expect(result).toBe('ok');
      expect(delays).toEqual([100, 200]);
    });

    it('should cap delays at maxDelayMs', () => {
      const policy = new RetryPolicy({
        maxAttempts: 10,
        baseDelayMs: 1000,
        maxDelayMs: 5000,
        jitterFactor: 0,
      });

      expect(policy.delayFor(1)).toBe(1000);
      expect(policy.delayFor(3)).toBe(4000);
      expect(policy.delayFor(4)).toBe(5000);
      expect(policy.delayFor(9)).toBe(5000);
    });

    it('should honor a longer Retry-After from rate limited errors', () => {
      const policy = new RetryPolicy({
        maxAttempts: 3,
        baseDelayMs: 100,
        maxDelayMs: 1000,
        jitterFactor: 0,
      });

      expect(policy.delayFor(1, new RateLimitedError('slow down', 3000))).toBe(3000);
      expect(policy.delayFor(1, new RateLimitedError('slow down', 50))).toBe(100);
    });

    it('should keep jittered delays within [d, d * (1 + jitter)]', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 1, max: 8 }),
          fc.double({ min: 0, max: 0.999, noNaN: true }),
          (n, rand) => {
            const policy = new RetryPolicy({
              maxAttempts: 10,
              baseDelayMs: 100,
              maxDelayMs: 10_000,
              jitterFactor: 0.1,
              random: () => rand,
            });
            const base = Math.min(10_000, 100 * Math.pow(2, n - 1));
            const value = policy.delayFor(n);
            return value >= base && value <= base * 1.1;
          }
        ),
        { numRuns: 50 }
      );
    });
  });

  describe('Classification', () => {
    it('should rethrow permanent errors without retrying', async () => {
      const { delays, sleep } = recordingSleep();
      const policy = RetryPolicy.dispatch({ sleep });
      const operation = vi.fn().mockRejectedValue(new AuthError('bad key'));

      await expect(policy.execute(operation)).rejects.toBeInstanceOf(AuthError);
      expect(operation).toHaveBeenCalledTimes(1);
      expect(delays).toEqual([]);
    });

    it('should carry the last error when attempts are exhausted', async () => {
      const { sleep } = recordingSleep();
      const policy = new RetryPolicy({
        maxAttempts: 2,
        baseDelayMs: 1,
        maxDelayMs: 1,
        jitterFactor: 0,
        sleep,
      });
      const last = new NetworkError('second failure');
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new NetworkError('first failure'))
        .mockRejectedValueOnce(last);

      const error = await policy.execute(operation).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetryExhaustedError);
      expect(error instanceof RetryExhaustedError && error.lastError).toBe(last);
      expect(error instanceof RetryExhaustedError && error.attempts).toBe(2);
    });

    it('should reject invalid configuration', () => {
      expect(
        () => new RetryPolicy({ maxAttempts: 0, baseDelayMs: 1, maxDelayMs: 1, jitterFactor: 0 })
      ).toThrow('maxAttempts must be a positive integer');
    });
  });
});
