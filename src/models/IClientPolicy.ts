/**
 * Retry and timeout settings bound to a lookup client
 */
export interface IClientPolicy {
  /** Timeout for one outbound request in milliseconds */
  timeoutMs: number;
  /** Extra attempts allowed after the first one */
  maxRetries: number;
  /** Pause before a rate-limit retry in milliseconds */
  retryDelayMs: number;
  /** Whether rate-limit responses are retried at all */
  respectRateLimit: boolean;
}

export const DEFAULT_CLIENT_POLICY: Readonly<IClientPolicy> = {
  timeoutMs: 10000,
  maxRetries: 1,
  retryDelayMs: 2000,
  respectRateLimit: true
};

/**
 * Overrides a single operation may apply on top of a client's policy
 */
export type IPolicyOverrides = Partial<Pick<IClientPolicy, 'maxRetries' | 'retryDelayMs' | 'respectRateLimit'>>;
