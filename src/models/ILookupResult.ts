/**
 * Interface representing one completed whois check
 */
export interface ILookupResult {
  /** Fully-qualified domain (e.g., "alpha.com") */
  readonly domain: string;
  /** Suffix portion without a leading dot (e.g., "com") */
  readonly domainSuffix: string;
  /** True when the service reports the domain as not available */
  readonly isRegistered: boolean;
  /** Service-reported timestamp, passed through untouched */
  readonly queryTime?: string;
}

/**
 * JSON shape of a lookup result on the HTTP surface
 */
export interface IWireLookupResult {
  domain: string;
  domain_suffix: string;
  is_registered: boolean;
  query_time: string | null;
}

/**
 * Convert a lookup result to its snake_case wire form
 */
export function toWireResult(result: ILookupResult): IWireLookupResult {
  return {
    domain: result.domain,
    domain_suffix: result.domainSuffix,
    is_registered: result.isRegistered,
    query_time: result.queryTime ?? null
  };
}
