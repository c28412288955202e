import { clampPolicy, decideRetry, isRateLimitMessage } from '../../../src/services/RetryPolicy';

describe('RetryPolicy', () => {
  const policy = { maxRetries: 2, retryDelayMs: 1500, respectRateLimit: true };

  describe('isRateLimitMessage', () => {
    test('should match throttling messages from the upstream service', () => {
      expect(isRateLimitMessage('调用频次超限，请2秒后重试')).toBe(true);
      expect(isRateLimitMessage('Rate exceeded')).toBe(true);
      expect(isRateLimitMessage('DAILY LIMIT REACHED')).toBe(true);
    });

    test('should not match other errors', () => {
      expect(isRateLimitMessage('domain format invalid')).toBe(false);
      expect(isRateLimitMessage('')).toBe(false);
    });
  });

  describe('decideRetry', () => {
    test('should retry a rate-limit error while attempts remain', () => {
      expect(decideRetry(0, 'rate limited', policy)).toEqual({ action: 'retry', delayMs: 1500 });
      expect(decideRetry(1, 'rate limited', policy)).toEqual({ action: 'retry', delayMs: 1500 });
    });

    test('should fail once the last attempt has been used', () => {
      expect(decideRetry(2, 'rate limited', policy)).toEqual({ action: 'fail', message: 'rate limited' });
    });

    test('should fail immediately on errors that are not throttling', () => {
      expect(decideRetry(0, 'unsupported suffix', policy)).toEqual({ action: 'fail', message: 'unsupported suffix' });
    });

    test('should never retry when rate-limit handling is off', () => {
      expect(decideRetry(0, '调用频次超限', { ...policy, respectRateLimit: false })).toEqual({
        action: 'fail',
        message: '调用频次超限'
      });
    });
  });

  describe('clampPolicy', () => {
    test('should clamp negatives and floor retries', () => {
      expect(clampPolicy({ timeoutMs: -5, maxRetries: 2.7, retryDelayMs: -100, respectRateLimit: false })).toEqual({
        timeoutMs: 0,
        maxRetries: 2,
        retryDelayMs: 0,
        respectRateLimit: false
      });
    });

    test('should replace non-finite numbers with zero', () => {
      expect(clampPolicy({ timeoutMs: 1000, maxRetries: Number.NaN, retryDelayMs: Infinity, respectRateLimit: true })).toEqual({
        timeoutMs: 1000,
        maxRetries: 0,
        retryDelayMs: 0,
        respectRateLimit: true
      });
    });
  });
});
