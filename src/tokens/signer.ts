/**
 * jwt-session-kit - Signer
 * Compact JWS encoding and verification behind a pluggable capability
 */

import {
  base64urlDecode,
  base64urlEncode,
  decodeJSON,
  encodeJSON,
  isAlgorithm,
  isBase64url,
  loadSigningKey,
  loadVerificationKey,
  sign,
  verify,
} from '../crypto';
import {
  Algorithm,
  ClaimSet,
  JWTHeader,
  TokenError,
  TOKEN_ERROR_MESSAGES,
  TOKEN_ERROR_MESSAGE_HELPERS,
  isClaimSet,
} from '../types';
import { readClaim } from './claims';

// ============================================================================
// CONTRACT
// ============================================================================

/**
 * The signing capability the token manager consumes.
 *
 * Implementations own the wire format and the time-window checks on `exp`
 * and `nbf`; everything semantic about claims is left to the caller.
 */
export interface Signer {
  /**
   * Serialize and sign a claim set.
   *
   * @throws {TokenError} `signing-error` when the key does not fit the algorithm
   */
  sign(claims: ClaimSet, algorithm: Algorithm, key: string): string;

  /**
   * Verify a compact token and return its claims.
   *
   * @param now - Current time in epoch seconds, compared against `exp`/`nbf`
   * with no leeway of its own
   * @throws {TokenError} `invalid-token`, `invalid-signature` or `expired-token`
   */
  verify(token: string, algorithm: Algorithm, key: string, now: number): ClaimSet;
}

// ============================================================================
// DECODING
// ============================================================================

/**
 * A compact token split into its parts, not yet verified.
 */
export interface DecodedToken {
  header: ClaimSet;
  payload: ClaimSet;
  signature: string;
  /** `header.payload` exactly as received; the bytes the signature covers. */
  signingInput: string;
}

function parseSegment(segment: string, notObjectMessage: string): ClaimSet {
  let parsed: unknown;
  try {
    parsed = decodeJSON(segment);
  } catch {
    throw TokenError.malformed(TOKEN_ERROR_MESSAGES.MALFORMED_JSON);
  }
  if (!isClaimSet(parsed)) {
    throw TokenError.malformed(notObjectMessage);
  }
  return parsed;
}

/**
 * Decode a compact token without verification.
 * Useful for inspecting token contents.
 *
 * @throws {TokenError} `invalid-token` when the token is structurally malformed
 */
export function decodeToken(token: string): DecodedToken {
  const parts = token.split('.');
  if (parts.length !== 3) {
    throw TokenError.malformed(TOKEN_ERROR_MESSAGES.WRONG_SEGMENT_COUNT);
  }

  const [headerSegment, payloadSegment, signature] = parts;
  if (!parts.every(isBase64url)) {
    throw TokenError.malformed(TOKEN_ERROR_MESSAGES.MALFORMED_SEGMENT);
  }

  return {
    header: parseSegment(headerSegment, TOKEN_ERROR_MESSAGES.HEADER_NOT_OBJECT),
    payload: parseSegment(payloadSegment, TOKEN_ERROR_MESSAGES.PAYLOAD_NOT_OBJECT),
    signature,
    signingInput: `${headerSegment}.${payloadSegment}`,
  };
}

function readTimeClaim(payload: ClaimSet, claim: 'exp' | 'nbf'): number | null {
  const value = readClaim(payload, claim);
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw TokenError.malformed(TOKEN_ERROR_MESSAGE_HELPERS.numericClaim(claim));
  }
  return value;
}

// ============================================================================
// NODE CRYPTO SIGNER
// ============================================================================

/**
 * Default `Signer` built on `node:crypto`.
 *
 * Verification runs in a fixed order: structure, header algorithm, signature,
 * then `nbf` and `exp`. A token whose header names an algorithm other than
 * the configured one is rejected before any key is touched.
 */
export class NodeCryptoSigner implements Signer {
  sign(claims: ClaimSet, algorithm: Algorithm, key: string): string {
    const signingKey = loadSigningKey(key, algorithm);
    const header: JWTHeader = { typ: 'JWT', alg: algorithm };

    try {
      const signingInput = `${encodeJSON(header)}.${encodeJSON(claims)}`;
      const signature = sign(signingInput, signingKey, algorithm);
      return `${signingInput}.${base64urlEncode(signature)}`;
    } catch (error) {
      throw TokenError.signing(TOKEN_ERROR_MESSAGES.SIGNING_FAILED, error);
    }
  }

  verify(token: string, algorithm: Algorithm, key: string, now: number): ClaimSet {
    const { header, payload, signature, signingInput } = decodeToken(token);

    const alg = header.alg;
    if (alg === undefined || alg === null || alg === '') {
      throw TokenError.malformed(TOKEN_ERROR_MESSAGES.EMPTY_ALGORITHM);
    }
    if (!isAlgorithm(alg)) {
      throw TokenError.malformed(TOKEN_ERROR_MESSAGES.ALGORITHM_NOT_SUPPORTED);
    }
    if (alg !== algorithm) {
      throw TokenError.malformed(TOKEN_ERROR_MESSAGES.INCORRECT_KEY_FOR_ALGORITHM);
    }

    const verificationKey = loadVerificationKey(key, algorithm);
    const signatureBytes = base64urlDecode(signature);
    // Trailing bits past the last whole byte are dropped by the decoder;
    // only the canonical encoding of the bytes counts as the signature.
    if (base64urlEncode(signatureBytes) !== signature) {
      throw TokenError.invalidSignature();
    }
    if (!verify(signingInput, signatureBytes, verificationKey, algorithm)) {
      throw TokenError.invalidSignature();
    }

    const nbf = readTimeClaim(payload, 'nbf');
    const exp = readTimeClaim(payload, 'exp');

    if (nbf !== null && now < nbf) {
      throw TokenError.notYetValid();
    }
    if (exp !== null && now > exp) {
      throw TokenError.expired();
    }

    return payload;
  }
}
