import { describe, it, expect, vi } from 'vitest';
import { JwtHeader, JwtPayload, toSecondsSinceEpoch } from '../../src/models/jwt-assertion.model.js';
import { loadGoldenTokens } from '../helpers/fixtures.js';

describe('JwtHeader', () => {
  it('should serialize typ before alg', () => {
    expect(JSON.stringify(new JwtHeader())).toBe('{"typ":"JWT","alg":"RS256"}');
  });
});

describe('JwtPayload', () => {
  const golden = loadGoldenTokens();

  it('should convert dates to whole seconds since epoch', () => {
    expect(toSecondsSinceEpoch(new Date('1970-01-01T00:00:00Z'))).toBe(0);
    expect(toSecondsSinceEpoch(new Date('2020-01-01T00:00:00Z'))).toBe(1577836800);
    expect(toSecondsSinceEpoch(new Date('2022-05-01T00:10:00.999Z'))).toBe(1651363800);
  });

  it('should serialize claims in iat, exp, iss, alg order', () => {
    const payload = new JwtPayload('123456');
    payload.issuedAt = new Date(golden.issuedAt);

    expect(JSON.stringify(payload)).toBe(golden.stringIssuer.payloadJson);
  });

  it('should keep a numeric issuer as a JSON number', () => {
    const payload = new JwtPayload(123456);
    payload.issuedAt = new Date(golden.issuedAt);

    expect(JSON.stringify(payload)).toBe(golden.numericIssuer.payloadJson);
  });

  it('should derive expiry and renewal deadline from issuedAt', () => {
    const payload = new JwtPayload('123456');
    payload.issuedAt = new Date('2022-05-01T00:00:00Z');

    expect(payload.expiresAt.toISOString()).toBe('2022-05-01T00:10:00.000Z');
    expect(payload.renewalDeadline.toISOString()).toBe('2022-05-01T00:08:00.000Z');
  });

  it('should start at the epoch', () => {
    const payload = new JwtPayload('123456');

    expect(payload.issuedAt.getTime()).toBe(0);
    expect(payload.expiresAt.toISOString()).toBe('1970-01-01T00:10:00.000Z');
  });

  it('should renew at expiry when the lifetime is not longer than the margin', () => {
    const payload = new JwtPayload('123456', { lifetimeMs: 2 * 60 * 1000, renewalMarginMs: 2 * 60 * 1000 });
    payload.issuedAt = new Date('2022-05-01T00:00:00Z');

    expect(payload.expiresAt.toISOString()).toBe('2022-05-01T00:02:00.000Z');
    expect(payload.renewalDeadline.toISOString()).toBe('2022-05-01T00:02:00.000Z');
  });

  it('should not alias the Date it was given', () => {
    const payload = new JwtPayload('123456');
    const issuedAt = new Date('2022-05-01T00:00:00Z');
    payload.issuedAt = issuedAt;
    issuedAt.setUTCFullYear(2030);

    expect(payload.issuedAt.toISOString()).toBe('2022-05-01T00:00:00.000Z');
  });

  it('should not let callers mutate the times through the returned Dates', () => {
    const payload = new JwtPayload('123456');
    payload.issuedAt = new Date('2022-05-01T00:00:00Z');
    const listener = vi.fn();
    payload.onChange(listener);

    payload.issuedAt.setTime(Date.UTC(2030, 0, 1));
    payload.expiresAt.setTime(0);
    payload.renewalDeadline.setTime(0);

    expect(payload.issuedAt.toISOString()).toBe('2022-05-01T00:00:00.000Z');
    expect(payload.expiresAt.toISOString()).toBe('2022-05-01T00:10:00.000Z');
    expect(payload.renewalDeadline.toISOString()).toBe('2022-05-01T00:08:00.000Z');
    expect(payload.expiresAt.getTime() - payload.issuedAt.getTime()).toBe(600000);
    expect(payload.toJSON()).toMatchObject({ iat: 1651363200, exp: 1651363800 });
    expect(listener).not.toHaveBeenCalled();
  });

  it('should notify listeners on every mutation until unsubscribed', () => {
    const payload = new JwtPayload('123456');
    const listener = vi.fn();
    const unsubscribe = payload.onChange(listener);

    payload.issuedAt = new Date('2022-05-01T00:00:00Z');
    payload.issuer = '654321';

    expect(listener).toHaveBeenNthCalledWith(1, 'issuedAt');
    expect(listener).toHaveBeenNthCalledWith(2, 'issuer');

    unsubscribe();
    payload.issuer = '111111';

    expect(listener).toHaveBeenCalledTimes(2);
    expect(payload.toJSON().iss).toBe('111111');
  });
});
