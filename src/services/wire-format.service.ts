import type { AccessToken } from '../types/token.types.js';

/**
 * Decoders for the REST API response bodies
 *
 * Each returns null when the body does not have the expected shape.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseDate(value: unknown): Date | undefined | null {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function parsePermissions(value: unknown): Record<string, string> | undefined | null {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) return null;

  const permissions: Record<string, string> = {};
  for (const [name, level] of Object.entries(value)) {
    if (typeof level !== 'string') return null;
    permissions[name] = level;
  }
  return permissions;
}

/**
 * Decodes a POST app/installations/{id}/access_tokens body
 */
export function parseAccessToken(body: unknown): AccessToken | null {
  if (!isRecord(body) || typeof body.token !== 'string' || body.token.length === 0) {
    return null;
  }

  const expiresAt = parseDate(body.expires_at);
  const permissions = parsePermissions(body.permissions);
  if (expiresAt === null || permissions === null) {
    return null;
  }

  const accessToken: AccessToken = { token: body.token };
  if (expiresAt) accessToken.expiresAt = expiresAt;
  if (permissions) accessToken.permissions = permissions;
  if (typeof body.repository_selection === 'string') {
    accessToken.repositorySelection = body.repository_selection;
  }
  return accessToken;
}

/**
 * Decodes a GET app/installations body into installation ids
 */
export function parseInstallationIds(body: unknown): number[] | null {
  if (!Array.isArray(body)) {
    return null;
  }

  const ids: number[] = [];
  for (const installation of body) {
    if (!isRecord(installation) || !Number.isSafeInteger(installation.id)) {
      return null;
    }
    ids.push(Number(installation.id));
  }
  return ids;
}
