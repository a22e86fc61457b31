import { AuthError } from '../errors/auth.error.js';
import { AxiosHttpProvider } from '../providers/axios-http.provider.js';
import type { IHttpProvider } from '../providers/http.provider.interface.js';
import type { AppAuthenticatorConfig, AuthenticationData, Issuer } from '../types/token.types.js';
import { AppTokenCache } from './app-token-cache.service.js';
import { InstallationTokenStore } from './installation-token-store.service.js';
import { logger, type StructuredLogger } from './logger.service.js';
import { metrics as defaultMetrics, type MetricsService } from './metrics.service.js';

export type InstallationIdInput = number | bigint | string;

/**
 * App Authenticator
 *
 * Hands out credentials for the two ways an App talks to the API:
 * - as the App itself, with the App JWT (getAppToken)
 * - as one of its installations, with an exchanged access token
 *   (getInstallationToken)
 *
 * SINGLETON PATTERN:
 * - initializeAppAuthenticator() builds the instance once at startup
 * - getAppAuthenticator() returns it
 * - tests and embedders can construct AppAuthenticator directly
 */
export class AppAuthenticator {
  readonly appTokens: AppTokenCache;
  readonly installationTokens: InstallationTokenStore;

  constructor(appTokens: AppTokenCache, installationTokens: InstallationTokenStore) {
    this.appTokens = appTokens;
    this.installationTokens = installationTokens;
  }

  /**
   * Builds the authenticator from configuration, reading the key file once
   *
   * @param httpProvider - transport override; defaults to AxiosHttpProvider
   */
  static async create(
    config: AppAuthenticatorConfig,
    deps: { httpProvider?: IHttpProvider | null; logger?: StructuredLogger; metrics?: MetricsService } = {}
  ): Promise<AppAuthenticator> {
    const log = deps.logger ?? logger;
    const metrics = deps.metrics ?? defaultMetrics;

    const appTokens = await AppTokenCache.fromPemFile(config.privateKeyPath, config.appId, {
      ...config.jwt,
      logger: log,
      metrics,
    });

    const httpProvider = deps.httpProvider === undefined ? new AxiosHttpProvider(config.http) : deps.httpProvider;
    const installationTokens = new InstallationTokenStore(appTokens, httpProvider, {
      ...config.installationTokens,
      logger: log,
      metrics,
    });

    return new AppAuthenticator(appTokens, installationTokens);
  }

  get appId(): Issuer {
    return this.appTokens.payload.issuer;
  }

  /**
   * Credential to authenticate as the App
   * @throws AuthError InvalidKeyMaterial when no App JWT can be produced
   */
  getAppToken(): AuthenticationData {
    return { type: 'AppToken', token: this.appTokens.requireToken() };
  }

  /**
   * Credential to authenticate as an installation of the App
   * @throws AuthError InvalidInstallationId | UnknownInstallation | ExchangeFailed | ...
   */
  async getInstallationToken(installationId: InstallationIdInput): Promise<AuthenticationData> {
    const id = parseInstallationId(installationId);
    const accessToken = await this.installationTokens.tokenFor(id);
    return { type: 'AppInstallationToken', token: accessToken.token };
  }
}

/**
 * Value for the Authorization header
 */
export function authorizationHeader(data: AuthenticationData): string {
  return `Bearer ${data.token}`;
}

/**
 * Accepts integers, bigints within the safe range and decimal strings
 * @throws AuthError InvalidInstallationId
 */
export function parseInstallationId(input: InstallationIdInput): number {
  let id: number;

  if (typeof input === 'number') {
    id = input;
  } else if (typeof input === 'bigint') {
    id = Number(input);
    if (BigInt(id) !== input) {
      throw new AuthError('InvalidInstallationId', `The value "${input}" is out of range`);
    }
  } else {
    const trimmed = input.trim();
    if (!/^\d+$/.test(trimmed)) {
      throw new AuthError('InvalidInstallationId', `The value "${input}" could not be converted to a number`);
    }
    id = Number(trimmed);
  }

  if (!Number.isSafeInteger(id) || id < 0) {
    throw new AuthError('InvalidInstallationId', `The input "${String(input)}" has an invalid value`);
  }
  return id;
}

// Singleton instance
let appAuthenticatorInstance: AppAuthenticator | null = null;

/**
 * Initializes the global authenticator instance
 *
 * ⚠️  IMPORTANT: This should only be called ONCE at application startup
 * Subsequent calls will replace the existing instance
 */
export async function initializeAppAuthenticator(
  config: AppAuthenticatorConfig,
  deps?: Parameters<typeof AppAuthenticator.create>[1]
): Promise<AppAuthenticator> {
  if (appAuthenticatorInstance) {
    logger.warn('AppAuthenticator already initialized. Replacing existing instance.');
  }
  appAuthenticatorInstance = await AppAuthenticator.create(config, deps);
  logger.info('AppAuthenticator singleton created and ready', { issuer: appAuthenticatorInstance.appId });
  return appAuthenticatorInstance;
}

/**
 * Gets the global authenticator instance
 * Throws if not initialized
 */
export function getAppAuthenticator(): AppAuthenticator {
  if (!appAuthenticatorInstance) {
    throw new Error('AppAuthenticator not initialized. Call initializeAppAuthenticator() first.');
  }
  return appAuthenticatorInstance;
}

/**
 * Clears the singleton (for testing)
 */
export function resetAppAuthenticator(): void {
  appAuthenticatorInstance = null;
}
