import { JWT_ALGORITHM } from '../types/token.types.js';
import type { Issuer, JwtHeaderClaims, JwtPayloadClaims } from '../types/token.types.js';

export const DEFAULT_JWT_LIFETIME_MS = 10 * 60 * 1000; // API maximum
export const DEFAULT_RENEWAL_MARGIN_MS = 2 * 60 * 1000;

const EPOCH = new Date(0);

export function toSecondsSinceEpoch(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * JWT header. Fixed for RS256.
 */
export class JwtHeader {
  readonly type = 'JWT';
  readonly algorithm = JWT_ALGORITHM;

  toJSON(): JwtHeaderClaims {
    return { typ: this.type, alg: this.algorithm };
  }
}

export interface JwtPayloadOptions {
  lifetimeMs?: number;
  renewalMarginMs?: number;
}

type ChangeListener = (field: keyof JwtPayload) => void;

/**
 * JWT payload
 *
 * expiresAt and renewalDeadline are derived from issuedAt and cannot be set.
 * The Date getters return copies; only the issuedAt setter moves the times.
 * Every mutation is reported to the change listeners so a cached signature
 * over the old claims can be dropped.
 */
export class JwtPayload {
  readonly algorithm = JWT_ALGORITHM;
  readonly lifetimeMs: number;
  readonly renewalMarginMs: number;

  private _issuedAt: Date = EPOCH;
  private _expiresAt: Date;
  private _renewalDeadline: Date;
  private _issuer: Issuer;
  private listeners = new Set<ChangeListener>();

  constructor(issuer: Issuer, options: JwtPayloadOptions = {}) {
    this._issuer = issuer;
    this.lifetimeMs = options.lifetimeMs ?? DEFAULT_JWT_LIFETIME_MS;
    this.renewalMarginMs = options.renewalMarginMs ?? DEFAULT_RENEWAL_MARGIN_MS;
    this._expiresAt = this.computeExpiry(this._issuedAt);
    this._renewalDeadline = this.computeRenewalDeadline(this._expiresAt);
  }

  get issuedAt(): Date {
    return new Date(this._issuedAt.getTime());
  }

  set issuedAt(value: Date) {
    this._issuedAt = new Date(value.getTime());
    this._expiresAt = this.computeExpiry(this._issuedAt);
    this._renewalDeadline = this.computeRenewalDeadline(this._expiresAt);
    this.notify('issuedAt');
  }

  get expiresAt(): Date {
    return new Date(this._expiresAt.getTime());
  }

  /**
   * Not serialized. Past this instant a cached token must be regenerated.
   */
  get renewalDeadline(): Date {
    return new Date(this._renewalDeadline.getTime());
  }

  get issuer(): Issuer {
    return this._issuer;
  }

  set issuer(value: Issuer) {
    this._issuer = value;
    this.notify('issuer');
  }

  /**
   * Registers a listener for payload mutations
   * @returns unsubscribe function
   */
  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  toJSON(): JwtPayloadClaims {
    return {
      iat: toSecondsSinceEpoch(this._issuedAt),
      exp: toSecondsSinceEpoch(this._expiresAt),
      iss: this._issuer,
      alg: this.algorithm,
    };
  }

  private computeExpiry(issuedAt: Date): Date {
    return new Date(issuedAt.getTime() + this.lifetimeMs);
  }

  private computeRenewalDeadline(expiresAt: Date): Date {
    if (this.lifetimeMs <= this.renewalMarginMs) {
      return expiresAt;
    }
    return new Date(expiresAt.getTime() - this.renewalMarginMs);
  }

  private notify(field: keyof JwtPayload): void {
    for (const listener of this.listeners) {
      listener(field);
    }
  }
}
