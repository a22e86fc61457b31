import crypto, { type KeyObject } from 'crypto';
import { AuthError } from '../errors/auth.error.js';
import type { JwtHeader, JwtPayload } from '../models/jwt-assertion.model.js';
import type { PrivateKeyMaterial, SignedToken } from '../types/token.types.js';

/**
 * JWT Signer
 *
 * token = b64url(header) "." b64url(payload) "." b64url(RSA-SHA256(first two segments))
 *
 * PKCS#1 v1.5 signatures are deterministic, so the same claims and key always
 * produce the same token.
 */

/**
 * Base64url without padding
 */
export function base64UrlEncode(input: string | Buffer): string {
  const bytes = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
  return bytes.toString('base64url');
}

export function base64UrlDecode(input: string): string {
  return Buffer.from(input, 'base64url').toString('utf8');
}

/**
 * Imports DER key bytes: PKCS#1 (BEGIN RSA PRIVATE KEY) first, then PKCS#8
 * (BEGIN PRIVATE KEY)
 *
 * @throws AuthError InvalidKeyMaterial
 */
export function importRsaPrivateKey(keyMaterial: PrivateKeyMaterial): KeyObject {
  let lastError: unknown;

  for (const type of ['pkcs1', 'pkcs8'] as const) {
    try {
      const key = crypto.createPrivateKey({ key: keyMaterial, format: 'der', type });
      if (key.asymmetricKeyType !== 'rsa') {
        throw new Error(`Unsupported key type: ${key.asymmetricKeyType ?? 'unknown'}`);
      }
      return key;
    } catch (error) {
      lastError = error;
    }
  }

  throw new AuthError('InvalidKeyMaterial', 'Key material is not an RSA private key', { cause: lastError });
}

export class JwtSigner {
  /**
   * Signs the header and payload with the given key
   *
   * @throws AuthError InvalidKeyMaterial when the key bytes are not an RSA private key
   */
  sign(header: JwtHeader, payload: JwtPayload, keyMaterial: PrivateKeyMaterial | KeyObject): SignedToken {
    const key = Buffer.isBuffer(keyMaterial) ? importRsaPrivateKey(keyMaterial) : keyMaterial;

    const signingInput = `${base64UrlEncode(JSON.stringify(header))}.${base64UrlEncode(JSON.stringify(payload))}`;

    let signature: Buffer;
    try {
      signature = crypto.sign('sha256', Buffer.from(signingInput, 'utf8'), {
        key,
        padding: crypto.constants.RSA_PKCS1_PADDING,
      });
    } catch (error) {
      throw new AuthError('InvalidKeyMaterial', 'Unable to sign token with the private key', { cause: error });
    }

    return `${signingInput}.${base64UrlEncode(signature)}`;
  }
}
