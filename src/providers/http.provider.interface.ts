import type { HttpRequest, HttpResponse } from '../types/http.types.js';

/**
 * HTTP Provider Interface
 *
 * The transport the installation token store talks through. Implementations
 * own retries, TLS and timeouts; the store only sees status and decoded body.
 */
export interface IHttpProvider {
  /**
   * Performs a request
   * @returns the response for every HTTP status; rejects on transport failure
   */
  request(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Gets provider name
   */
  getName(): string;
}
