/**
 * Application configuration
 * Maps the environment onto the authenticator's typed configuration
 */

import { config as env } from './env.js';
import type { AppAuthenticatorConfig } from '../types/token.types.js';

export function createAppAuthenticatorConfig(): AppAuthenticatorConfig {
  return {
    privateKeyPath: env.privateKeyPath,
    appId: env.appId,
    jwt: {
      lifetimeMs: env.jwtLifetimeMs,
      renewalMarginMs: env.jwtRenewalMarginMs,
      clockDriftMs: env.jwtClockDriftMs,
    },
    installationTokens: {
      refreshMarginMs: env.accessTokenRefreshMarginMs,
    },
    http: {
      baseUrl: env.apiUrl,
      timeout: env.apiTimeoutMs,
    },
  };
}

export type { AppAuthenticatorConfig };
