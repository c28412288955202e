import type { ILookupResult, IPolicyOverrides } from '../../models';

/**
 * Anything able to check one candidate domain.
 * Lets the orchestration layer run against the real whois client or a stub.
 */
export interface ILookupClient {
  /**
   * Look up a single fully-qualified domain
   * @param domain - Candidate domain
   * @returns Promise resolving to the lookup result
   * @throws LookupError when no usable answer could be obtained
   */
  lookup(domain: string): Promise<ILookupResult>;

  /**
   * Derive a client with some policy fields replaced, leaving this one untouched
   */
  withPolicy?(overrides: IPolicyOverrides): ILookupClient;
}

/**
 * Outbound leg of a lookup: one request to the whois API, one parsed JSON body back
 */
export interface IWhoisTransport {
  /**
   * Fetch and parse the service response for a domain
   * @param domain - Domain to query
   * @param timeoutMs - Request timeout in milliseconds
   * @returns Parsed JSON body
   * @throws LookupError on network failure, HTTP error status, or a non-JSON body
   */
  fetchPayload(domain: string, timeoutMs: number): Promise<unknown>;
}
