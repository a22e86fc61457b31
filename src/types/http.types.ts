/**
 * HTTP collaborator types
 */

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
  method: HttpMethod;
  path: string; // relative to the provider's base URL, e.g. "app/installations"
  headers: Record<string, string>;
  body?: unknown;
}

/**
 * Any status resolves as a response; only transport failures reject
 */
export interface HttpResponse {
  status: number;
  data: unknown;
}
