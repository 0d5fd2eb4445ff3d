/**
 * jwt-session-kit - Signer Tests
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { NodeCryptoSigner, decodeToken } from '../../src/tokens/signer';
import {
  base64urlEncode,
  encodeJSON,
  generateKeyPair,
  loadSigningKey,
  sign,
} from '../../src/crypto';
import { Algorithm, ClaimSet, KeyMaterial } from '../../src/types';
import { TEST_SECRET, catchTokenError } from '../helpers';

const NOW = 1_700_000_000;

/**
 * Build a token from arbitrary header/payload, signed with HS256
 */
function forgeHmacToken(header: unknown, payload: unknown, secret = TEST_SECRET): string {
  const signingInput = `${encodeJSON(header)}.${encodeJSON(payload)}`;
  const signature = sign(signingInput, loadSigningKey(secret, Algorithm.HS256), Algorithm.HS256);
  return `${signingInput}.${base64urlEncode(signature)}`;
}

describe('NodeCryptoSigner', () => {
  const signer = new NodeCryptoSigner();
  const claims: ClaimSet = { sub: 'user-1', iat: NOW, exp: NOW + 3600, nbf: NOW - 5 };

  describe('sign', () => {
    it('should produce three base64url segments with the JWT header', () => {
      const token = signer.sign(claims, Algorithm.HS256, TEST_SECRET);
      const parts = token.split('.');

      expect(parts).toHaveLength(3);
      expect(parts[0]).toBe('eyJ0eXAiOiJKV1QiLCJhbGciOiJIUzI1NiJ9');
      expect(parts[1]).toBe(encodeJSON(claims));
    });

    it('should reject key material that does not fit the algorithm', () => {
      const error = catchTokenError(() => signer.sign(claims, Algorithm.RS256, TEST_SECRET));
      expect(error.kind).toBe('signing-error');
      expect(error.httpStatus).toBe(500);
    });
  });

  describe('verify', () => {
    it('should return the claims of a valid token', () => {
      const token = signer.sign(claims, Algorithm.HS256, TEST_SECRET);
      expect(signer.verify(token, Algorithm.HS256, TEST_SECRET, NOW)).toEqual(claims);
    });

    it('should reject a token with too few segments', () => {
      const error = catchTokenError(() => signer.verify('abc.def', Algorithm.HS256, TEST_SECRET, NOW));
      expect(error.detail).toEqual({ kind: 'invalid-token', reason: 'malformed' });
      expect(error.message).toBe('Wrong number of segments');
    });

    it('should reject a token with too many segments', () => {
      const error = catchTokenError(() => signer.verify('a.b.c.d', Algorithm.HS256, TEST_SECRET, NOW));
      expect(error.message).toBe('Wrong number of segments');
    });

    it('should reject segments outside the base64url alphabet', () => {
      const error = catchTokenError(() => signer.verify('ab+c.def.ghi', Algorithm.HS256, TEST_SECRET, NOW));
      expect(error.kind).toBe('invalid-token');
      expect(error.message).toBe('Malformed base64url segment');
    });

    it('should reject a header that is not JSON', () => {
      const token = `${base64urlEncode('nope')}.${encodeJSON({})}.c2ln`;
      const error = catchTokenError(() => signer.verify(token, Algorithm.HS256, TEST_SECRET, NOW));
      expect(error.message).toBe('Syntax error, malformed JSON');
    });

    it('should reject a payload that is not an object', () => {
      const token = forgeHmacToken({ typ: 'JWT', alg: 'HS256' }, ['sub']);
      const error = catchTokenError(() => signer.verify(token, Algorithm.HS256, TEST_SECRET, NOW));
      expect(error.message).toBe('Payload must be a JSON object');
    });

    it('should reject a header without an algorithm', () => {
      const token = forgeHmacToken({ typ: 'JWT' }, claims);
      const error = catchTokenError(() => signer.verify(token, Algorithm.HS256, TEST_SECRET, NOW));
      expect(error.message).toBe('Empty algorithm');
    });

    it('should reject algorithms outside the supported set', () => {
      const token = `${encodeJSON({ typ: 'JWT', alg: 'none' })}.${encodeJSON(claims)}.`;
      const error = catchTokenError(() => signer.verify(token, Algorithm.HS256, TEST_SECRET, NOW));
      expect(error.message).toBe('Algorithm not supported');
    });

    it('should reject a tampered payload', () => {
      const token = signer.sign(claims, Algorithm.HS256, TEST_SECRET);
      const [header, , signature] = token.split('.');
      const tampered = `${header}.${encodeJSON({ ...claims, sub: 'admin' })}.${signature}`;

      const error = catchTokenError(() => signer.verify(tampered, Algorithm.HS256, TEST_SECRET, NOW));
      expect(error.kind).toBe('invalid-signature');
      expect(error.message).toBe(
        'Token signature verification failed. The public key could not validate this token.'
      );
    });

    it('should reject a token signed with another secret', () => {
      const token = signer.sign(claims, Algorithm.HS256, 'other-secret');
      const error = catchTokenError(() => signer.verify(token, Algorithm.HS256, TEST_SECRET, NOW));
      expect(error.kind).toBe('invalid-signature');
    });

    it('should surface an unusable verification key as a signing error', () => {
      const token = signer.sign(claims, Algorithm.HS256, TEST_SECRET);
      const error = catchTokenError(() => signer.verify(token, Algorithm.HS256, '', NOW));
      expect(error.kind).toBe('signing-error');
    });

    describe('time window', () => {
      const token = new NodeCryptoSigner().sign(claims, Algorithm.HS256, TEST_SECRET);

      it('should accept a token at exactly nbf', () => {
        expect(() => signer.verify(token, Algorithm.HS256, TEST_SECRET, NOW - 5)).not.toThrow();
      });

      it('should reject a token before nbf', () => {
        const error = catchTokenError(() => signer.verify(token, Algorithm.HS256, TEST_SECRET, NOW - 6));
        expect(error.detail).toEqual({ kind: 'invalid-token', reason: 'not-yet-valid' });
        expect(error.message).toBe('Token is not yet valid');
      });

      it('should accept a token at exactly exp', () => {
        expect(() => signer.verify(token, Algorithm.HS256, TEST_SECRET, NOW + 3600)).not.toThrow();
      });

      it('should reject a token after exp', () => {
        const error = catchTokenError(() => signer.verify(token, Algorithm.HS256, TEST_SECRET, NOW + 3601));
        expect(error.kind).toBe('expired-token');
        expect(error.action).toBe('renew');
      });

      it('should check nbf before exp', () => {
        const narrow = signer.sign({ nbf: NOW + 10, exp: NOW - 10 }, Algorithm.HS256, TEST_SECRET);
        const error = catchTokenError(() => signer.verify(narrow, Algorithm.HS256, TEST_SECRET, NOW));
        expect(error.message).toBe('Token is not yet valid');
      });

      it('should reject a non-numeric exp', () => {
        const bad = signer.sign({ exp: 'tomorrow' }, Algorithm.HS256, TEST_SECRET);
        const error = catchTokenError(() => signer.verify(bad, Algorithm.HS256, TEST_SECRET, NOW));
        expect(error.kind).toBe('invalid-token');
        expect(error.message).toBe('Payload exp must be a number');
      });

      it('should accept a token without exp or nbf', () => {
        const open = signer.sign({ sub: 'user-1' }, Algorithm.HS256, TEST_SECRET);
        expect(signer.verify(open, Algorithm.HS256, TEST_SECRET, NOW)).toEqual({ sub: 'user-1' });
      });
    });
  });

  describe('algorithm binding', () => {
    let rsaKeys: KeyMaterial;

    beforeAll(async () => {
      rsaKeys = await generateKeyPair(Algorithm.RS256);
    });

    it('should reject a token whose header names another algorithm', () => {
      const token = signer.sign(claims, Algorithm.HS256, TEST_SECRET);
      const error = catchTokenError(() => signer.verify(token, Algorithm.RS256, rsaKeys.publicKey, NOW));
      expect(error.message).toBe('Incorrect key for this algorithm');
    });

    it('should not accept an HMAC token keyed with the RSA public key', () => {
      // Classic confusion: HS256 signed with the public PEM as the secret
      const signingInput = `${encodeJSON({ typ: 'JWT', alg: 'HS256' })}.${encodeJSON(claims)}`;
      const token = `${signingInput}.${base64urlEncode('forged')}`;
      const error = catchTokenError(() => signer.verify(token, Algorithm.RS256, rsaKeys.publicKey, NOW));
      expect(error.kind).toBe('invalid-token');
    });

    it('should verify RS256 tokens with the public key', () => {
      const token = signer.sign(claims, Algorithm.RS256, rsaKeys.privateKey);
      expect(signer.verify(token, Algorithm.RS256, rsaKeys.publicKey, NOW)).toEqual(claims);
    });
  });
});

describe('decodeToken', () => {
  it('should split a token without verifying it', () => {
    const token = forgeHmacToken({ typ: 'JWT', alg: 'HS256' }, { sub: 'user-1' }, 'any-secret');
    const decoded = decodeToken(token);

    expect(decoded.header).toEqual({ typ: 'JWT', alg: 'HS256' });
    expect(decoded.payload).toEqual({ sub: 'user-1' });
    expect(decoded.signingInput).toBe(token.split('.').slice(0, 2).join('.'));
  });

  it('should reject a header that is a JSON array', () => {
    const token = `${encodeJSON([1])}.${encodeJSON({})}.c2ln`;
    const error = catchTokenError(() => decodeToken(token));
    expect(error.message).toBe('Header must be a JSON object');
  });
});
