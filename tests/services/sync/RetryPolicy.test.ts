import { RetryPolicy } from '../../../src/services/sync/RetryPolicy';

describe('RetryPolicy', () => {
  describe('calculateDelay', () => {
    it('should double the delay until the cap', () => {
      const policy = new RetryPolicy({ jitter: false, maxDelayMs: 5000 });

      expect([0, 1, 2, 3, 4].map((attempt) => policy.calculateDelay(attempt))).toEqual([
        1000, 2000, 4000, 5000, 5000,
      ]);
    });

    it('should stay monotonic and capped under jitter', () => {
      const samples = [0, 0.999, 0.5, 0.001, 0.75, 0.2, 0.9, 0.4];
      let index = 0;
      const policy = new RetryPolicy({ maxDelayMs: 30000 }, () => {
        const value = samples[index % samples.length];
        index++;
        return value;
      });

      for (let round = 0; round < 20; round++) {
        let previous = 0;
        for (let attempt = 0; attempt < 8; attempt++) {
          const delay = policy.calculateDelay(attempt);
          expect(delay).toBeLessThanOrEqual(30000);
          if (attempt > 0 && 1000 * 2 ** attempt <= 30000) {
            expect(delay).toBeGreaterThanOrEqual(previous);
          }
          previous = delay;
        }
      }
    });

    it('should scale into the [0.9, 1.0] band', () => {
      expect(new RetryPolicy({}, () => 0).calculateDelay(1)).toBe(1800);
      expect(new RetryPolicy({}, () => 1).calculateDelay(1)).toBe(2000);
    });
  });

  describe('execute', () => {
    it('should retry until the operation succeeds', async () => {
      const sleep = jest.fn(async (_ms: number) => undefined);
      const policy = new RetryPolicy({ jitter: false }, Math.random, sleep);
      const operation = jest
        .fn<Promise<string>, []>()
        .mockRejectedValueOnce(new Error('first'))
        .mockRejectedValueOnce(new Error('second'))
        .mockResolvedValueOnce('done');

      await expect(policy.execute(operation)).resolves.toBe('done');
      expect(operation).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    });

    it('should rethrow after maxRetries retries', async () => {
      const policy = new RetryPolicy({ maxRetries: 2 }, Math.random, async () => undefined);
      const operation = jest.fn(async () => {
        throw new Error('always');
      });

      await expect(policy.execute(operation)).rejects.toThrow('always');
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should stop when the error is not retryable', async () => {
      const policy = new RetryPolicy({}, Math.random, async () => undefined);
      const operation = jest.fn(async () => {
        throw new Error('bad request');
      });

      await expect(policy.execute(operation, () => false)).rejects.toThrow('bad request');
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });
});
