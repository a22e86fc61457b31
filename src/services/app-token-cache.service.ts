import type { KeyObject } from 'crypto';
import { AuthError, getErrorMessage, isAuthError } from '../errors/auth.error.js';
import { JwtHeader, JwtPayload } from '../models/jwt-assertion.model.js';
import type { Issuer, JwtLifetimeConfig, SignedToken } from '../types/token.types.js';
import { JwtSigner, importRsaPrivateKey } from './jwt-signer.service.js';
import { loadPrivateKey } from './pem-key-reader.service.js';
import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';
import { metrics as defaultMetrics, type MetricsService } from './metrics.service.js';

export const DEFAULT_CLOCK_DRIFT_MS = 60 * 1000;

export interface AppTokenCacheOptions extends Partial<JwtLifetimeConfig> {
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

/**
 * App Token Cache
 *
 * Holds the signed App JWT and regenerates it lazily:
 * - no token cached, or now > renewalDeadline -> backdate issuedAt by the
 *   clock drift and sign again
 * - otherwise the cached string is returned and issuedAt is left alone
 *
 * Any payload mutation drops the cached token immediately.
 *
 * currentToken() never awaits, so a renewal cannot interleave with another
 * caller on the event loop.
 */
export class AppTokenCache {
  readonly header = new JwtHeader();
  readonly payload: JwtPayload;
  readonly clockDriftMs: number;

  private token: SignedToken | null = null;
  private readonly signer = new JwtSigner();
  private readonly keyMaterial: Buffer | KeyObject;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsService;

  constructor(keyMaterial: Buffer, issuer: Issuer, options: AppTokenCacheOptions = {}) {
    this.payload = new JwtPayload(issuer, {
      lifetimeMs: options.lifetimeMs,
      renewalMarginMs: options.renewalMarginMs,
    });
    this.clockDriftMs = options.clockDriftMs ?? DEFAULT_CLOCK_DRIFT_MS;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'app-token-cache' });
    this.metrics = options.metrics ?? defaultMetrics;
    this.keyMaterial = parseKeyOnce(keyMaterial, this.logger);

    this.payload.onChange(() => this.invalidate());
  }

  /**
   * Reads the key from a PEM file once and builds the cache
   *
   * @throws AuthError KeyFileNotFound | InvalidKeyMaterial
   */
  static async fromPemFile(path: string, issuer: Issuer, options: AppTokenCacheOptions = {}): Promise<AppTokenCache> {
    const keyMaterial = await loadPrivateKey(path);
    return new AppTokenCache(keyMaterial, issuer, options);
  }

  /**
   * Gets the App JWT, regenerating it when absent or past the renewal deadline
   * @returns the signed token, or null when signing fails
   */
  currentToken(): SignedToken | null {
    if (this.token !== null && Date.now() <= this.payload.renewalDeadline.getTime()) {
      return this.token;
    }

    // Recomputes expiresAt and renewalDeadline, and invalidates the cache
    this.payload.issuedAt = new Date(Date.now() - this.clockDriftMs);

    try {
      const token = this.signer.sign(this.header, this.payload, this.keyMaterial);
      this.token = token;
      this.metrics.recordAppJwtRenewal(true);
      this.logger.appJwtRenewed({
        issuer: this.payload.issuer,
        token,
        issuedAt: this.payload.issuedAt,
        expiresAt: this.payload.expiresAt,
      });
    } catch (error) {
      this.token = null;
      this.metrics.recordAppJwtRenewal(false);
      this.logger.appJwtRenewalFailed({
        issuer: this.payload.issuer,
        error: getErrorMessage(error),
        error_code: isAuthError(error) ? error.kind : undefined,
      });
    }

    return this.token;
  }

  /**
   * Like currentToken(), for callers that cannot proceed without a token
   * @throws AuthError InvalidKeyMaterial
   */
  requireToken(): SignedToken {
    const token = this.currentToken();
    if (token === null) {
      throw new AuthError('InvalidKeyMaterial', 'The system could not generate a valid App JWT');
    }
    return token;
  }

  /**
   * Drops the cached token; the next access signs a new one
   */
  invalidate(): void {
    this.token = null;
  }

  hasToken(): boolean {
    return this.token !== null;
  }
}

/**
 * Imports the key up front when possible. Bytes that do not import are kept
 * as they are, so the failure surfaces on signing as "no token available".
 */
function parseKeyOnce(keyMaterial: Buffer, logger: StructuredLogger): Buffer | KeyObject {
  try {
    return importRsaPrivateKey(keyMaterial);
  } catch (error) {
    logger.warn('Private key could not be imported; App JWT signing will fail', {
      error_code: isAuthError(error) ? error.kind : undefined,
    });
    return keyMaterial;
  }
}
