import {
  calculateDelay,
  HttpStatusError,
  isTransientError,
  retryWithBackoff,
  RetryExhaustedError,
  RetryOptions
} from './retry.util';

describe('retry.util', () => {
  const options: RetryOptions = { maxRetries: 2, baseDelay: 1, maxDelay: 4, jitterFactor: 0 };

  describe('calculateDelay', () => {
    // Test: Doubling per attempt, capped at maxDelay
    it('should back off exponentially up to the cap', () => {
      const opts = { maxRetries: 5, baseDelay: 100, maxDelay: 1000, jitterFactor: 0 };

      expect(calculateDelay(0, opts)).toBe(100);
      expect(calculateDelay(2, opts)).toBe(400);
      expect(calculateDelay(5, opts)).toBe(1000);
    });

    it('should keep jitter within the configured band', () => {
      const delay = calculateDelay(1, { maxRetries: 1, baseDelay: 100, maxDelay: 1000, jitterFactor: 0.1 });

      expect(delay).toBeGreaterThanOrEqual(180);
      expect(delay).toBeLessThanOrEqual(220);
    });
  });

  describe('retryWithBackoff', () => {
    // Test: Transient failures are retried until success
    it('should return the first successful result', async () => {
      const operation = jest
        .fn<Promise<number>, []>()
        .mockRejectedValueOnce(new Error('ECONNREFUSED'))
        .mockResolvedValueOnce(42);

      await expect(retryWithBackoff(operation, options, isTransientError)).resolves.toBe(42);
      expect(operation).toHaveBeenCalledTimes(2);
    });

    // Test: maxRetries + 1 attempts, then RetryExhaustedError
    it('should give up after the last retry', async () => {
      const operation = jest.fn<Promise<number>, []>().mockRejectedValue(new HttpStatusError(503, 'Service Unavailable'));

      const attempt = retryWithBackoff(operation, options, isTransientError);

      await expect(attempt).rejects.toBeInstanceOf(RetryExhaustedError);
      await expect(attempt).rejects.toMatchObject({ attempts: 3 });
      expect(operation).toHaveBeenCalledTimes(3);
    });

    // Test: Client errors fail fast
    it('should not retry a non-retryable error', async () => {
      const operation = jest.fn<Promise<number>, []>().mockRejectedValue(new HttpStatusError(400, 'Bad Request'));

      await expect(retryWithBackoff(operation, options, isTransientError)).rejects.toThrow('HTTP 400: Bad Request');
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  describe('isTransientError', () => {
    it.each([
      [new HttpStatusError(429, 'Too Many Requests'), true],
      [new HttpStatusError(502, 'Bad Gateway'), true],
      [new HttpStatusError(404, 'Not Found'), false],
      [new TypeError('fetch failed'), true],
      [new Error('Request timeout'), true],
      [new Error('Unexpected chart response for TTF=F'), false]
    ])('should classify %s', (error, expected) => {
      expect(isTransientError(error)).toBe(expected);
    });
  });
});
