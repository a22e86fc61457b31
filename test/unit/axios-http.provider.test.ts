import { describe, it, expect, vi } from 'vitest';
import axios, { type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { AxiosHttpProvider } from '../../src/providers/axios-http.provider.js';
import { AppTokenCache } from '../../src/services/app-token-cache.service.js';
import { InstallationTokenStore } from '../../src/services/installation-token-store.service.js';
import { MetricsService } from '../../src/services/metrics.service.js';
import { isAuthError } from '../../src/errors/auth.error.js';
import { decodePemBody, readFixture } from '../helpers/fixtures.js';

/**
 * The provider is exercised through a custom axios adapter, so no socket is
 * opened. Custom adapters bypass axios' status validation.
 */
function clientAnswering(respond: (config: InternalAxiosRequestConfig) => Pick<AxiosResponse, 'status' | 'data'>) {
  const seen: InternalAxiosRequestConfig[] = [];
  const client = axios.create({
    adapter: async (config) => {
      seen.push(config);
      const { status, data } = respond(config);
      return { status, data, statusText: String(status), headers: {}, config };
    },
  });
  return { client, seen };
}

describe('AxiosHttpProvider', () => {
  it('should send requests relative to the base URL with API headers', async () => {
    const { client, seen } = clientAnswering(() => ({ status: 200, data: [{ id: 1 }] }));
    const provider = new AxiosHttpProvider({ baseUrl: 'http://localhost:8080', timeout: 5000 }, client);

    const response = await provider.request({
      method: 'GET',
      path: 'app/installations',
      headers: { Authorization: 'Bearer test-jwt' },
    });

    expect(response).toEqual({ status: 200, data: [{ id: 1 }] });
    expect(seen).toHaveLength(1);
    expect(seen[0].method).toBe('get');
    expect(seen[0].baseURL).toBe('http://localhost:8080');
    expect(seen[0].url).toBe('app/installations');
    expect(seen[0].timeout).toBe(5000);
    expect(seen[0].headers.get('Authorization')).toBe('Bearer test-jwt');
    expect(seen[0].headers.get('Accept')).toBe('application/vnd.github+json');
    expect(seen[0].headers.get('User-Agent')).toBe('app-token-service');
  });

  it('should default to the public API URL', () => {
    const { client } = clientAnswering(() => ({ status: 200, data: null }));

    new AxiosHttpProvider({}, client);

    expect(client.defaults.baseURL).toBe('https://api.github.com');
    expect(client.defaults.timeout).toBe(10000);
  });

  it('should treat every status as a response', () => {
    const { client } = clientAnswering(() => ({ status: 200, data: null }));

    new AxiosHttpProvider({}, client);

    expect(client.defaults.validateStatus?.(404)).toBe(true);
    expect(client.defaults.validateStatus?.(500)).toBe(true);
  });

  it('should reject on transport errors', async () => {
    const client = axios.create({
      adapter: vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:8080')),
    });
    const provider = new AxiosHttpProvider({ baseUrl: 'http://localhost:8080' }, client);

    await expect(
      provider.request({ method: 'POST', path: 'app/installations/1/access_tokens', headers: {} })
    ).rejects.toThrow('connect ECONNREFUSED 127.0.0.1:8080');
  });

  it('should carry the store through a full exchange', async () => {
    const { client, seen } = clientAnswering((config) => {
      if (config.url === 'app/installations') {
        return { status: 200, data: [{ id: 7 }] };
      }
      return { status: 201, data: { token: 'ghs_test-axios', expires_at: '2099-01-01T00:00:00Z' } };
    });
    const metrics = new MetricsService();
    const appTokens = new AppTokenCache(decodePemBody(readFixture('sample_key.pem')), '123456', { metrics });
    const store = new InstallationTokenStore(appTokens, new AxiosHttpProvider({}, client), { metrics });

    const accessToken = await store.tokenFor(7);

    expect(accessToken.token).toBe('ghs_test-axios');
    expect(seen.map((c) => `${c.method} ${c.url}`)).toEqual([
      'get app/installations',
      'post app/installations/7/access_tokens',
    ]);
  });

  it('should let the store turn a 404 into ExchangeFailed', async () => {
    const { client } = clientAnswering((config) =>
      config.url === 'app/installations'
        ? { status: 200, data: [{ id: 7 }] }
        : { status: 404, data: { message: 'Not Found' } }
    );
    const metrics = new MetricsService();
    const appTokens = new AppTokenCache(decodePemBody(readFixture('sample_key.pem')), '123456', { metrics });
    const store = new InstallationTokenStore(appTokens, new AxiosHttpProvider({}, client), { metrics });

    const error = await store.tokenFor(7).catch((e: unknown) => e);

    expect(isAuthError(error, 'ExchangeFailed')).toBe(true);
  });
});
