import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { LookupError } from '../errors';
import type { IWhoisTransport } from '../patterns/strategy/ILookupClient';

export const DEFAULT_WHOIS_ENDPOINT = 'https://api.whoiscx.com/whois/?domain={domain}';

/**
 * HTTP transport for the whois lookup API, built on axios
 */
export class AxiosWhoisTransport implements IWhoisTransport {
  private readonly endpointTemplate: string;
  private readonly http: AxiosInstance;

  /**
   * @param endpointTemplate - URL containing a `{domain}` placeholder
   * @param http - axios instance; tests pass one with an in-process adapter
   */
  constructor(endpointTemplate: string = DEFAULT_WHOIS_ENDPOINT, http: AxiosInstance = axios.create()) {
    if (!endpointTemplate.includes('{domain}')) {
      throw new Error(`Whois endpoint template must contain {domain}: ${endpointTemplate}`);
    }
    this.endpointTemplate = endpointTemplate;
    this.http = http;
  }

  /**
   * Build the request URL with the domain escaped as a query value
   */
  buildUrl(domain: string): string {
    return this.endpointTemplate.replace('{domain}', encodeURIComponent(domain));
  }

  async fetchPayload(domain: string, timeoutMs: number): Promise<unknown> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(this.buildUrl(domain), {
        timeout: timeoutMs,
        responseType: 'text',
        // Keep the raw body; parsing happens below so bad JSON is reported as such
        transformResponse: (data: unknown) => data,
        headers: { Accept: 'application/json' },
        validateStatus: () => true
      });
    } catch (error) {
      throw new LookupError(domain, `whois lookup failed for ${domain}: ${describeRequestError(error, timeoutMs)}`, {
        cause: error
      });
    }

    if (response.status >= 400) {
      throw new LookupError(domain, `whois lookup failed for ${domain}: HTTP ${response.status}`);
    }

    const body = response.data;
    if (typeof body !== 'string') {
      throw new LookupError(domain, `whois service returned non-JSON data for ${domain}`);
    }

    try {
      const payload: unknown = JSON.parse(body);
      return payload;
    } catch (error) {
      throw new LookupError(domain, `whois service returned non-JSON data for ${domain}`, { cause: error });
    }
  }
}

function describeRequestError(error: unknown, timeoutMs: number): string {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return `timed out after ${timeoutMs}ms`;
    }
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
