import { Mutex } from 'async-mutex';
import { AuthError, getErrorMessage } from '../errors/auth.error.js';
import type { IHttpProvider } from '../providers/http.provider.interface.js';
import type { HttpRequest, HttpResponse } from '../types/http.types.js';
import type { AccessToken, InstallationTokenStoreConfig } from '../types/token.types.js';
import type { AppTokenCache } from './app-token-cache.service.js';
import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';
import { metrics as defaultMetrics, type MetricsService } from './metrics.service.js';
import { parseAccessToken, parseInstallationIds } from './wire-format.service.js';

export const DEFAULT_REFRESH_MARGIN_MS = 2 * 60 * 1000;

export interface InstallationTokenStoreOptions extends Partial<InstallationTokenStoreConfig> {
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

/**
 * Installation Token Store
 *
 * Maps installation ids to access tokens obtained by exchanging the App JWT.
 *
 * Locking:
 * - installationsMutex guards the installation id set and its refresh
 * - one mutex per installation guards that installation's map entry, so at
 *   most one exchange per installation is in flight while different
 *   installations refresh independently
 *
 * A failed exchange leaves the previous entry in place.
 */
export class InstallationTokenStore {
  private readonly appTokens: AppTokenCache;
  private httpProvider: IHttpProvider | null;
  private readonly refreshMarginMs: number;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsService;

  private installationIds = new Set<number>();
  private readonly installationsMutex = new Mutex();
  private readonly accessTokens = new Map<number, AccessToken>();
  private readonly tokenMutexes = new Map<number, Mutex>();

  constructor(
    appTokens: AppTokenCache,
    httpProvider: IHttpProvider | null = null,
    options: InstallationTokenStoreOptions = {}
  ) {
    this.appTokens = appTokens;
    this.httpProvider = httpProvider;
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'installation-token-store' });
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Supplies or replaces the HTTP collaborator
   */
  setHttpProvider(httpProvider: IHttpProvider): void {
    this.httpProvider = httpProvider;
  }

  /**
   * Installation ids known to be valid for the App
   */
  get installations(): ReadonlySet<number> {
    return new Set(this.installationIds);
  }

  /**
   * Snapshot of the cached access tokens, as copies
   */
  get tokens(): ReadonlyMap<number, AccessToken> {
    const snapshot = new Map<number, AccessToken>();
    for (const [installationId, accessToken] of this.accessTokens) {
      snapshot.set(installationId, copyAccessToken(accessToken));
    }
    return snapshot;
  }

  /**
   * Gets a valid access token for an installation, exchanging the App JWT
   * for a new one when missing or about to expire
   *
   * @throws AuthError CollaboratorNotConfigured | UnknownInstallation |
   *   InstallationListFailed | ExchangeFailed | InvalidKeyMaterial
   */
  async tokenFor(installationId: number): Promise<AccessToken> {
    const http = this.requireHttpProvider();

    await this.ensureKnownInstallation(installationId, http);

    return this.mutexFor(installationId).runExclusive(async () => {
      const cached = this.accessTokens.get(installationId);
      if (cached && !this.isStale(cached)) {
        this.metrics.recordTokenCacheHit();
        return copyAccessToken(cached);
      }

      const fresh = await this.exchange(installationId, http);
      this.accessTokens.set(installationId, fresh);
      return copyAccessToken(fresh);
    });
  }

  /**
   * Reloads the installation id set from the API
   * @throws AuthError CollaboratorNotConfigured | InstallationListFailed | InvalidKeyMaterial
   */
  async refreshInstallations(): Promise<ReadonlySet<number>> {
    const http = this.requireHttpProvider();
    return this.installationsMutex.runExclusive(async () => {
      await this.loadInstallations(http);
      return this.installations;
    });
  }

  private async ensureKnownInstallation(installationId: number, http: IHttpProvider): Promise<void> {
    await this.installationsMutex.runExclusive(async () => {
      if (this.installationIds.has(installationId)) {
        return;
      }

      await this.loadInstallations(http);

      if (!this.installationIds.has(installationId)) {
        throw new AuthError(
          'UnknownInstallation',
          `Installation '${installationId}' is not valid for App '${this.appTokens.payload.issuer}'`
        );
      }
    });
  }

  /**
   * Must be called while holding installationsMutex
   */
  private async loadInstallations(http: IHttpProvider): Promise<void> {
    const startedAt = Date.now();

    let ids: number[] | null = null;
    let failure = 'Unable to parse installation list';
    try {
      const response = await this.send(http, { method: 'GET', path: 'app/installations' });
      if (isSuccess(response)) {
        ids = parseInstallationIds(response.data);
      } else {
        failure = `Installation list request failed with status ${response.status}`;
      }
    } catch (error) {
      if (error instanceof AuthError) throw error;
      this.metrics.recordInstallationRefresh(false);
      throw new AuthError('InstallationListFailed', `Installation list request failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    if (ids === null) {
      this.metrics.recordInstallationRefresh(false);
      throw new AuthError('InstallationListFailed', failure);
    }

    this.installationIds = new Set(ids);
    this.metrics.recordInstallationRefresh(true);
    this.logger.installationsRefreshed({ count: ids.length, duration: Date.now() - startedAt });
  }

  private async exchange(installationId: number, http: IHttpProvider): Promise<AccessToken> {
    const startedAt = Date.now();

    let response: HttpResponse;
    try {
      response = await this.send(http, {
        method: 'POST',
        path: `app/installations/${installationId}/access_tokens`,
      });
    } catch (error) {
      if (error instanceof AuthError) throw error;
      throw this.exchangeFailed(installationId, getErrorMessage(error), undefined, error);
    }

    if (!isSuccess(response)) {
      throw this.exchangeFailed(
        installationId,
        `Unable to generate an access token (status ${response.status})`,
        response.status
      );
    }

    const accessToken = parseAccessToken(response.data);
    if (accessToken === null) {
      throw this.exchangeFailed(installationId, 'Unable to parse access token response', response.status);
    }

    this.metrics.recordTokenExchange(true);
    this.logger.installationTokenExchanged({
      installationId,
      token: accessToken.token,
      expiresAt: accessToken.expiresAt,
      duration: Date.now() - startedAt,
    });
    return accessToken;
  }

  private exchangeFailed(installationId: number, reason: string, status?: number, cause?: unknown): AuthError {
    this.metrics.recordTokenExchange(false);
    this.logger.installationTokenExchangeFailed({ installationId, error: reason, http_status: status });
    return new AuthError('ExchangeFailed', `Installation '${installationId}': ${reason}`, { cause });
  }

  /**
   * Sends a bearer-authenticated request with the current App JWT
   */
  private async send(http: IHttpProvider, request: Omit<HttpRequest, 'headers'>): Promise<HttpResponse> {
    const appJwt = this.appTokens.requireToken();
    return http.request({
      ...request,
      headers: { Authorization: `Bearer ${appJwt}` },
    });
  }

  /**
   * Missing expires_at means the token does not expire
   */
  private isStale(accessToken: AccessToken): boolean {
    if (!accessToken.expiresAt) {
      return false;
    }
    return accessToken.expiresAt.getTime() < Date.now() + this.refreshMarginMs;
  }

  private mutexFor(installationId: number): Mutex {
    let mutex = this.tokenMutexes.get(installationId);
    if (!mutex) {
      mutex = new Mutex();
      this.tokenMutexes.set(installationId, mutex);
    }
    return mutex;
  }

  private requireHttpProvider(): IHttpProvider {
    if (!this.httpProvider) {
      throw new AuthError('CollaboratorNotConfigured', 'No HTTP provider configured for the installation token store');
    }
    return this.httpProvider;
  }
}

/**
 * Callers get copies so they cannot move a cached token's expiry
 */
function copyAccessToken(accessToken: AccessToken): AccessToken {
  const copy: AccessToken = { ...accessToken };
  if (accessToken.expiresAt) copy.expiresAt = new Date(accessToken.expiresAt.getTime());
  if (accessToken.permissions) copy.permissions = { ...accessToken.permissions };
  return copy;
}

function isSuccess(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}
