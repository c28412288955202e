import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { AxiosWhoisTransport, DEFAULT_WHOIS_ENDPOINT } from '../../../src/services/AxiosWhoisTransport';
import { LookupError } from '../../../src/errors';

const ENDPOINT = 'https://whois.test/api/?domain={domain}';

/**
 * In-process adapter answering every request with a fixed body and status
 */
function respondWith(data: unknown, status: number = 200, seen: InternalAxiosRequestConfig[] = []): AxiosAdapter {
  return async config => {
    seen.push(config);
    return { data, status, statusText: String(status), headers: {}, config };
  };
}

function failWith(error: Error): AxiosAdapter {
  return async () => {
    throw error;
  };
}

function transportWith(adapter: AxiosAdapter): AxiosWhoisTransport {
  return new AxiosWhoisTransport(ENDPOINT, axios.create({ adapter }));
}

describe('AxiosWhoisTransport', () => {
  describe('URL building', () => {
    test('should escape the domain as a query value', () => {
      const transport = new AxiosWhoisTransport(ENDPOINT);
      expect(transport.buildUrl('a b&c.com')).toBe('https://whois.test/api/?domain=a%20b%26c.com');
    });

    test('should default to the public endpoint', () => {
      expect(new AxiosWhoisTransport().buildUrl('alpha.com')).toBe(
        DEFAULT_WHOIS_ENDPOINT.replace('{domain}', 'alpha.com')
      );
    });

    test('should reject a template without a placeholder', () => {
      expect(() => new AxiosWhoisTransport('https://whois.test/api')).toThrow(
        'Whois endpoint template must contain {domain}'
      );
    });
  });

  describe('Responses', () => {
    test('should return the parsed JSON body', async () => {
      const seen: InternalAxiosRequestConfig[] = [];
      const transport = transportWith(respondWith('{"status":1,"data":{"is_available":1}}', 200, seen));

      await expect(transport.fetchPayload('alpha.com', 1500)).resolves.toEqual({
        status: 1,
        data: { is_available: 1 }
      });
      expect(seen).toHaveLength(1);
      expect(seen[0]?.url).toBe('https://whois.test/api/?domain=alpha.com');
      expect(seen[0]?.timeout).toBe(1500);
      expect(seen[0]?.method).toBe('get');
    });

    test('should reject a body that is not JSON', async () => {
      const transport = transportWith(respondWith('<html>busy</html>'));
      await expect(transport.fetchPayload('alpha.com', 1000)).rejects.toThrow(
        'whois service returned non-JSON data for alpha.com'
      );
    });

    test('should reject HTTP error statuses', async () => {
      const transport = transportWith(respondWith('{"status":0}', 503));
      await expect(transport.fetchPayload('alpha.com', 1000)).rejects.toThrow(
        'whois lookup failed for alpha.com: HTTP 503'
      );
    });
  });

  describe('Network failures', () => {
    test('should wrap connection errors', async () => {
      const transport = transportWith(failWith(new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED')));
      const error = await transport.fetchPayload('alpha.com', 1000).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(LookupError);
      expect(error).toHaveProperty('message', 'whois lookup failed for alpha.com: connect ECONNREFUSED 127.0.0.1:443');
    });

    test('should report timeouts with the configured limit', async () => {
      const transport = transportWith(failWith(new AxiosError('timeout of 50ms exceeded', 'ECONNABORTED')));
      await expect(transport.fetchPayload('alpha.com', 50)).rejects.toThrow(
        'whois lookup failed for alpha.com: timed out after 50ms'
      );
    });
  });
});
