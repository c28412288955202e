import type { ILookupResult, IClientPolicy, IPolicyOverrides } from '../models';
import { DEFAULT_CLIENT_POLICY } from '../models';
import { LookupError } from '../errors';
import type { ILookupClient, IWhoisTransport } from '../patterns/strategy/ILookupClient';
import { AxiosWhoisTransport } from './AxiosWhoisTransport';
import { clampPolicy, decideRetry } from './RetryPolicy';
import { isRecord } from '../utils/guards';

/**
 * Whois Lookup Client - one remote lookup per domain, with rate-limit-aware retry
 *
 * Only application-level throttling errors are retried. Network failures,
 * HTTP errors and unparseable bodies fail the lookup on the first attempt.
 *
 * The policy is read when a lookup starts; do not change it while a lookup
 * on the same instance is in flight. Use `withPolicy` for per-operation overrides.
 */
export class WhoisLookupClient implements ILookupClient {
  private policy: IClientPolicy;

  constructor(
    policy: Partial<IClientPolicy> = {},
    private readonly transport: IWhoisTransport = new AxiosWhoisTransport(),
    private readonly sleep: (ms: number) => Promise<void> = delay
  ) {
    this.policy = clampPolicy({ ...DEFAULT_CLIENT_POLICY, ...policy });
  }

  /**
   * Get the current policy
   * @returns Copy of the policy
   */
  getPolicy(): IClientPolicy {
    return { ...this.policy };
  }

  /**
   * Replace some policy fields in place
   * @param policy - Fields to change
   */
  setPolicy(policy: Partial<IClientPolicy>): void {
    this.policy = clampPolicy({ ...this.policy, ...policy });
  }

  withPolicy(overrides: IPolicyOverrides): WhoisLookupClient {
    return new WhoisLookupClient({ ...this.policy, ...overrides }, this.transport, this.sleep);
  }

  async lookup(domain: string): Promise<ILookupResult> {
    const policy = this.policy;
    let lastMessage = 'unknown reason';

    for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
      const payload = await this.transport.fetchPayload(domain, policy.timeoutMs);
      if (!isRecord(payload)) {
        throw new LookupError(domain, `whois service returned an unexpected payload for ${domain}`);
      }

      if (payload['status'] === 1) {
        return this.toResult(domain, payload['data']);
      }

      lastMessage = errorMessageOf(payload);
      const decision = decideRetry(attempt, lastMessage, policy);
      if (decision.action === 'fail') {
        throw new LookupError(domain, `whois service returned an error for ${domain}: ${decision.message}`);
      }

      if (decision.delayMs > 0) {
        await this.sleep(decision.delayMs);
      }
    }

    throw new LookupError(domain, `whois service returned an error for ${domain}: ${lastMessage}`);
  }

  /**
   * Build a result from the `data` section of a successful response
   */
  private toResult(domain: string, data: unknown): ILookupResult {
    const fields: Record<string, unknown> = isRecord(data) ? data : {};
    const isAvailable = fields['is_available'];

    if (isAvailable === undefined || isAvailable === null) {
      throw new LookupError(domain, `whois service response for ${domain} has no availability indicator`);
    }

    const reportedDomain = fields['domain'];
    const reportedSuffix = fields['domain_suffix'];
    const queryTime = fields['query_time'];

    return {
      domain: typeof reportedDomain === 'string' && reportedDomain ? reportedDomain : domain,
      domainSuffix:
        typeof reportedSuffix === 'string' && reportedSuffix
          ? reportedSuffix
          : domain.slice(domain.lastIndexOf('.') + 1),
      // 0 and false both mean taken
      isRegistered: isAvailable === 0 || isAvailable === false,
      ...(typeof queryTime === 'string' && { queryTime })
    };
  }
}

function errorMessageOf(payload: Record<string, unknown>): string {
  const error = payload['error'];
  if (!error) {
    return JSON.stringify(payload);
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
