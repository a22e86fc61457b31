/**
 * Token management types
 */

/**
 * DER bytes of an RSA private key, decoded from a PEM body
 */
export type PrivateKeyMaterial = Buffer;

/**
 * Three-segment base64url JWT
 */
export type SignedToken = string;

/**
 * App identifier, kept verbatim in the `iss` claim
 */
export type Issuer = string | number;

export const JWT_ALGORITHM = 'RS256';

/**
 * Serialized JWT header, in wire order
 */
export interface JwtHeaderClaims {
  typ: 'JWT';
  alg: typeof JWT_ALGORITHM;
}

/**
 * Serialized JWT payload, in wire order
 */
export interface JwtPayloadClaims {
  iat: number; // issued at (Unix timestamp in seconds)
  exp: number; // expiration (Unix timestamp in seconds)
  iss: Issuer;
  alg: typeof JWT_ALGORITHM;
}

/**
 * Access token response from the exchange endpoint
 */
export interface AccessTokenResponse {
  token: string;
  expires_at?: string;
  permissions?: Record<string, string>;
  repository_selection?: string;
}

/**
 * Installation access token
 */
export interface AccessToken {
  token: string;
  expiresAt?: Date;
  permissions?: Record<string, string>;
  repositorySelection?: string;
}

export type AuthenticationTokenType = 'AppToken' | 'AppInstallationToken';

/**
 * Credential handed to client code
 */
export interface AuthenticationData {
  type: AuthenticationTokenType;
  token: string;
}

/**
 * Lifetime settings of the App JWT
 */
export interface JwtLifetimeConfig {
  lifetimeMs: number; // exp - iat
  renewalMarginMs: number; // Renew N milliseconds before exp
  clockDriftMs: number; // iat is backdated by this much
}

/**
 * Installation token store configuration
 */
export interface InstallationTokenStoreConfig {
  refreshMarginMs: number; // Exchange again N milliseconds before expires_at
}

/**
 * HTTP provider configuration
 */
export interface HttpProviderConfig {
  baseUrl: string;
  timeout?: number;
  userAgent?: string;
}

/**
 * Authenticator configuration
 */
export interface AppAuthenticatorConfig {
  privateKeyPath: string;
  appId: Issuer;
  jwt?: Partial<JwtLifetimeConfig>;
  installationTokens?: Partial<InstallationTokenStoreConfig>;
  http?: HttpProviderConfig;
}
