import { describe, it, expect } from 'vitest';
import * as jose from 'jose';
import {
  JwtManager,
  createJwtManager,
  decodeAccessToken,
  extractBearerToken,
  parseDuration,
} from './jwt-manager.js';
import { JwtError, type JwtErrorReason } from '../errors.js';
import { otherKeyPair, testKeyPair } from '../test-utils/keys.js';

// 2024-01-15T10:30:00Z
const T0 = Date.UTC(2024, 0, 15, 10, 30, 0);
const T0_SECONDS = T0 / 1000;

function clock(start = T0) {
  let current = start;
  return {
    now: () => current,
    set: (ms: number) => {
      current = ms;
    },
  };
}

async function rejectionReason(promise: Promise<unknown>): Promise<JwtErrorReason | undefined> {
  try {
    await promise;
  } catch (error) {
    return error instanceof JwtError ? error.reason : undefined;
  }
  return undefined;
}

describe('@vouch/auth - JwtManager', () => {
  const keys = testKeyPair();

  describe('parseDuration', () => {
    it('should parse every unit', () => {
      expect(parseDuration('30s')).toBe(30);
      expect(parseDuration('15m')).toBe(900);
      expect(parseDuration('1h')).toBe(3600);
      expect(parseDuration('168h')).toBe(604800);
      expect(parseDuration('7d')).toBe(604800);
      expect(parseDuration('2w')).toBe(1209600);
    });

    it('should throw for invalid format', () => {
      expect(() => parseDuration('invalid')).toThrow('Invalid duration format');
      expect(() => parseDuration('15')).toThrow('Invalid duration format');
      expect(() => parseDuration('m15')).toThrow('Invalid duration format');
    });
  });

  describe('construction', () => {
    it('should default to a 15 minute lifetime', () => {
      expect(new JwtManager({ keys }).accessTokenTtl).toBe(900);
    });

    it('should accept seconds', () => {
      expect(createJwtManager({ keys, accessTokenTtl: 60 }).accessTokenTtl).toBe(60);
    });

    it('should reject a zero lifetime', () => {
      expect(() => new JwtManager({ keys, accessTokenTtl: '0s' })).toThrow(RangeError);
    });
  });

  describe('issueAccessToken', () => {
    it('should sign RS256 tokens with the standard claims', async () => {
      const manager = new JwtManager({ keys, issuer: 'test-issuer', now: clock().now });
      const issued = await manager.issueAccessToken('acct_1', 'a@x.io');

      expect(issued.expiresIn).toBe(900);
      expect(issued.expiresAt).toEqual(new Date(T0 + 900_000));
      expect(jose.decodeProtectedHeader(issued.token)).toEqual({ alg: 'RS256', typ: 'JWT' });
      expect(decodeAccessToken(issued.token)).toEqual({
        user_id: 'acct_1',
        email: 'a@x.io',
        sub: 'acct_1',
        iss: 'test-issuer',
        iat: T0_SECONDS,
        nbf: T0_SECONDS,
        exp: T0_SECONDS + 900,
      });
    });

    it('should include the audience when configured', async () => {
      const manager = new JwtManager({ keys, audience: 'test-audience', now: clock().now });
      const issued = await manager.issueAccessToken('acct_1', 'a@x.io');

      expect(decodeAccessToken(issued.token)?.aud).toBe('test-audience');
    });
  });

  describe('verifyAccessToken', () => {
    it('should return the claims of a valid token', async () => {
      const manager = new JwtManager({ keys, now: clock().now });
      const { token } = await manager.issueAccessToken('acct_1', 'a@x.io');

      const claims = await manager.verifyAccessToken(token);

      expect(claims.user_id).toBe('acct_1');
      expect(claims.email).toBe('a@x.io');
      expect(claims.iss).toBe('auth-service');
      expect(claims.exp).toBe(T0_SECONDS + 900);
    });

    it('should reject an expired token', async () => {
      const time = clock();
      const manager = new JwtManager({ keys, now: time.now });
      const { token } = await manager.issueAccessToken('acct_1', 'a@x.io');

      time.set(T0 + 900_000);

      expect(await rejectionReason(manager.verifyAccessToken(token))).toBe('EXPIRED');
    });

    it('should accept a token one second before it expires', async () => {
      const time = clock();
      const manager = new JwtManager({ keys, now: time.now });
      const { token } = await manager.issueAccessToken('acct_1', 'a@x.io');

      time.set(T0 + 899_000);

      await expect(manager.verifyAccessToken(token)).resolves.toMatchObject({ sub: 'acct_1' });
    });

    it('should reject a token used before it is valid', async () => {
      const time = clock();
      const manager = new JwtManager({ keys, now: time.now });
      const { token } = await manager.issueAccessToken('acct_1', 'a@x.io');

      time.set(T0 - 60_000);

      expect(await rejectionReason(manager.verifyAccessToken(token))).toBe('NOT_YET_VALID');
    });

    it('should reject a token signed by another key', async () => {
      const forger = new JwtManager({ keys: otherKeyPair(), now: clock().now });
      const manager = new JwtManager({ keys, now: clock().now });
      const { token } = await forger.issueAccessToken('acct_1', 'a@x.io');

      expect(await rejectionReason(manager.verifyAccessToken(token))).toBe('SIGNATURE_MISMATCH');
    });

    it('should reject a tampered payload', async () => {
      const manager = new JwtManager({ keys, now: clock().now });
      const { token } = await manager.issueAccessToken('acct_1', 'a@x.io');
      const [header, , signature] = token.split('.');
      const payload = Buffer.from(
        JSON.stringify({
          user_id: 'acct_2',
          email: 'b@x.io',
          sub: 'acct_2',
          iss: 'auth-service',
          iat: T0_SECONDS,
          nbf: T0_SECONDS,
          exp: T0_SECONDS + 900,
        })
      ).toString('base64url');

      expect(await rejectionReason(manager.verifyAccessToken(`${header}.${payload}.${signature}`))).toBe(
        'SIGNATURE_MISMATCH'
      );
    });

    it('should reject any algorithm but RS256', async () => {
      const manager = new JwtManager({ keys, now: clock().now });
      const token = await new jose.SignJWT({ user_id: 'acct_1', email: 'a@x.io' })
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject('acct_1')
        .setIssuer('auth-service')
        .setIssuedAt(T0_SECONDS)
        .setNotBefore(T0_SECONDS)
        .setExpirationTime(T0_SECONDS + 900)
        .sign(new TextEncoder().encode('test-secret'));

      expect(await rejectionReason(manager.verifyAccessToken(token))).toBe('ALGORITHM_MISMATCH');
    });

    it('should reject another issuer', async () => {
      const other = new JwtManager({ keys, issuer: 'someone-else', now: clock().now });
      const manager = new JwtManager({ keys, now: clock().now });
      const { token } = await other.issueAccessToken('acct_1', 'a@x.io');

      expect(await rejectionReason(manager.verifyAccessToken(token))).toBe('INVALID_CLAIMS');
    });

    it('should reject a missing audience when one is required', async () => {
      const issuer = new JwtManager({ keys, now: clock().now });
      const manager = new JwtManager({ keys, audience: 'test-audience', now: clock().now });
      const { token } = await issuer.issueAccessToken('acct_1', 'a@x.io');

      expect(await rejectionReason(manager.verifyAccessToken(token))).toBe('INVALID_CLAIMS');
    });

    it('should reject a token without user_id', async () => {
      const manager = new JwtManager({ keys, now: clock().now });
      const token = await new jose.SignJWT({ email: 'a@x.io' })
        .setProtectedHeader({ alg: 'RS256' })
        .setSubject('acct_1')
        .setIssuer('auth-service')
        .setIssuedAt(T0_SECONDS)
        .setNotBefore(T0_SECONDS)
        .setExpirationTime(T0_SECONDS + 900)
        .sign(keys.privateKey);

      expect(await rejectionReason(manager.verifyAccessToken(token))).toBe('INVALID_CLAIMS');
    });

    it.each(['', 'not-a-jwt', 'a.b.c'])('should reject malformed token %j', async (token) => {
      const manager = new JwtManager({ keys, now: clock().now });

      expect(await rejectionReason(manager.verifyAccessToken(token))).toBe('MALFORMED');
    });
  });

  describe('getPublicKeySet', () => {
    it('should publish the RSA public key', () => {
      const manager = new JwtManager({ keys });
      const { keys: published } = manager.getPublicKeySet();

      expect(published).toHaveLength(1);
      expect(published[0]).toMatchObject({ kty: 'RSA', use: 'sig', alg: 'RS256', e: 'AQAB' });
      expect(published[0]?.n).toBe(keys.publicKey.export({ format: 'jwk' }).n);
    });

    it('should return the same frozen set on every call', () => {
      const manager = new JwtManager({ keys });

      expect(manager.getPublicKeySet()).toBe(manager.getPublicKeySet());
      expect(Object.isFrozen(manager.getPublicKeySet())).toBe(true);
    });

    it('should verify tokens with the published key', async () => {
      const manager = new JwtManager({ keys, now: clock().now });
      const { token } = await manager.issueAccessToken('acct_1', 'a@x.io');
      const [jwk] = manager.getPublicKeySet().keys;
      if (!jwk) throw new Error('no key published');

      const key = await jose.importJWK({ ...jwk }, 'RS256');
      const { payload } = await jose.jwtVerify(token, key, { currentDate: new Date(T0) });

      expect(payload.sub).toBe('acct_1');
    });
  });

  describe('extractBearerToken', () => {
    it('should extract the token', () => {
      expect(extractBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    });

    it.each([null, undefined, '', 'Basic abc', 'Bearer', 'Bearer a b', 'bearer abc'])(
      'should return null for %j',
      (header) => {
        expect(extractBearerToken(header)).toBeNull();
      }
    );
  });
});
