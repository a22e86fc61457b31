export {
  AppAuthenticator,
  authorizationHeader,
  getAppAuthenticator,
  initializeAppAuthenticator,
  parseInstallationId,
  resetAppAuthenticator,
} from './services/app-authenticator.service.js';
export type { InstallationIdInput } from './services/app-authenticator.service.js';
export { AppTokenCache, DEFAULT_CLOCK_DRIFT_MS } from './services/app-token-cache.service.js';
export type { AppTokenCacheOptions } from './services/app-token-cache.service.js';
export { InstallationTokenStore, DEFAULT_REFRESH_MARGIN_MS } from './services/installation-token-store.service.js';
export type { InstallationTokenStoreOptions } from './services/installation-token-store.service.js';
export { JwtSigner, base64UrlEncode, base64UrlDecode, importRsaPrivateKey } from './services/jwt-signer.service.js';
export { PemScanner, readPrivateKey, loadPrivateKey } from './services/pem-key-reader.service.js';
export { parseAccessToken, parseInstallationIds } from './services/wire-format.service.js';
export { StructuredLogger, logger, createLogger, maskToken } from './services/logger.service.js';
export { MetricsService, metrics } from './services/metrics.service.js';
export {
  JwtHeader,
  JwtPayload,
  DEFAULT_JWT_LIFETIME_MS,
  DEFAULT_RENEWAL_MARGIN_MS,
  toSecondsSinceEpoch,
} from './models/jwt-assertion.model.js';
export type { JwtPayloadOptions } from './models/jwt-assertion.model.js';
export { AxiosHttpProvider, DEFAULT_API_URL } from './providers/axios-http.provider.js';
export type { IHttpProvider } from './providers/http.provider.interface.js';
export { AuthError, isAuthError } from './errors/auth.error.js';
export type { ErrorKind } from './errors/auth.error.js';
export { createAppAuthenticatorConfig } from './config/config.js';
export * from './types/token.types.js';
export type * from './types/http.types.js';
