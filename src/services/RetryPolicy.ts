import type { IClientPolicy } from '../models';

/**
 * Tokens that mark an upstream error message as throttling.
 * The default upstream answers in Chinese ("频次" = call frequency, "超限" = over limit).
 */
export const RATE_LIMIT_TOKENS: readonly string[] = ['频次', 'rate', 'limit', '超限'];

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'fail'; message: string };

/**
 * Case-insensitive substring match against the rate-limit tokens
 */
export function isRateLimitMessage(message: string): boolean {
  const normalized = message.toLowerCase();
  return RATE_LIMIT_TOKENS.some(token => normalized.includes(token));
}

/**
 * Decide what to do after an application-level lookup error
 * @param attempt - Zero-based index of the attempt that just failed
 * @param message - Error message reported by the service
 * @param policy - Policy of the client making the attempt
 * @returns Retry after a delay, or fail with the message
 */
export function decideRetry(
  attempt: number,
  message: string,
  policy: Pick<IClientPolicy, 'maxRetries' | 'retryDelayMs' | 'respectRateLimit'>
): RetryDecision {
  if (policy.respectRateLimit && isRateLimitMessage(message) && attempt < policy.maxRetries) {
    return { action: 'retry', delayMs: policy.retryDelayMs };
  }
  return { action: 'fail', message };
}

/**
 * Bring a policy into range: whole non-negative retries, non-negative delays
 */
export function clampPolicy(policy: IClientPolicy): IClientPolicy {
  return {
    timeoutMs: nonNegative(policy.timeoutMs),
    maxRetries: Math.floor(nonNegative(policy.maxRetries)),
    retryDelayMs: nonNegative(policy.retryDelayMs),
    respectRateLimit: policy.respectRateLimit
  };
}

function nonNegative(value: number): number {
  return Number.isFinite(value) ? Math.max(0, value) : 0;
}
