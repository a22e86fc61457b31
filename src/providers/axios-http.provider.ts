import axios, { type AxiosInstance } from 'axios';
import type { IHttpProvider } from './http.provider.interface.js';
import type { HttpRequest, HttpResponse } from '../types/http.types.js';
import type { HttpProviderConfig } from '../types/token.types.js';

export const DEFAULT_API_URL = 'https://api.github.com';

/**
 * Axios HTTP Provider
 *
 * Default IHttpProvider for the REST API.
 * - Base URL, timeout and User-Agent from configuration
 * - Every status resolves as a response; the caller decides what a failure is
 * - Network errors and timeouts reject with the AxiosError
 */
export class AxiosHttpProvider implements IHttpProvider {
  private client: AxiosInstance;

  constructor(config: Partial<HttpProviderConfig> = {}, client?: AxiosInstance) {
    this.client = client ?? axios.create();
    this.client.defaults.baseURL = config.baseUrl ?? DEFAULT_API_URL;
    this.client.defaults.timeout = config.timeout ?? 10000; // 10 second timeout
    this.client.defaults.validateStatus = () => true;
    this.client.defaults.headers.common['Accept'] = 'application/vnd.github+json';
    this.client.defaults.headers.common['User-Agent'] = config.userAgent ?? 'app-token-service';
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.client.request({
      method: request.method,
      url: request.path,
      headers: request.headers,
      data: request.body,
    });

    return {
      status: response.status,
      data: response.data,
    };
  }

  getName(): string {
    return 'AxiosHttpProvider';
  }
}
