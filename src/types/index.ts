/**
 * jwt-session-kit - Core Types
 *
 * This module defines the shared TypeScript types, interfaces, and the error
 * type used throughout the library. It is the canonical source of truth for:
 *
 * - the closed set of signing algorithms
 * - claim set and header structures
 * - the collaborator contracts (clock, id generator)
 * - the token error taxonomy and its machine-readable metadata
 * - result types for issuance and verification
 */

// ============================================================================
// ALGORITHMS
// ============================================================================

/**
 * Supported signing algorithms.
 *
 * The values are grouped by the shape of key they need: HMAC algorithms use a
 * shared secret, every other family uses an asymmetric key pair.
 *
 * @enum {string}
 * @property {string} HS256 - HMAC using SHA-256
 * @property {string} HS384 - HMAC using SHA-384
 * @property {string} HS512 - HMAC using SHA-512
 * @property {string} RS256 - RSA PKCS#1 v1.5 using SHA-256
 * @property {string} RS384 - RSA PKCS#1 v1.5 using SHA-384
 * @property {string} RS512 - RSA PKCS#1 v1.5 using SHA-512
 * @property {string} ES256 - ECDSA using P-256 and SHA-256
 * @property {string} ES384 - ECDSA using P-384 and SHA-384
 * @property {string} ES512 - ECDSA using P-521 and SHA-512
 * @property {string} PS256 - RSA-PSS using SHA-256
 * @property {string} PS384 - RSA-PSS using SHA-384
 * @property {string} PS512 - RSA-PSS using SHA-512
 * @property {string} EdDSA - Edwards-curve signatures (Ed25519 / Ed448)
 */
export enum Algorithm {
  // HMAC
  HS256 = 'HS256',
  HS384 = 'HS384',
  HS512 = 'HS512',
  // RSA (PKCS#1 v1.5)
  RS256 = 'RS256',
  RS384 = 'RS384',
  RS512 = 'RS512',
  // ECDSA
  ES256 = 'ES256',
  ES384 = 'ES384',
  ES512 = 'ES512',
  // RSA-PSS
  PS256 = 'PS256',
  PS384 = 'PS384',
  PS512 = 'PS512',
  // EdDSA
  EdDSA = 'EdDSA',
}

export type HmacAlgorithm = Algorithm.HS256 | Algorithm.HS384 | Algorithm.HS512;
export type RsaAlgorithm = Algorithm.RS256 | Algorithm.RS384 | Algorithm.RS512;
export type EcdsaAlgorithm = Algorithm.ES256 | Algorithm.ES384 | Algorithm.ES512;
export type RsaPssAlgorithm = Algorithm.PS256 | Algorithm.PS384 | Algorithm.PS512;

// ============================================================================
// CLAIM TYPES
// ============================================================================

/**
 * A decoded or to-be-encoded JWT payload.
 *
 * Values are whatever JSON can carry; typed access goes through
 * `TokenPayload`.
 */
export type ClaimSet = Record<string, unknown>;

/**
 * Whether a parsed JSON value is an object usable as a claim set or header.
 */
export function isClaimSet(value: unknown): value is ClaimSet {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Claims the manager always writes itself. A caller-supplied value under any
 * of these keys is overwritten.
 */
export const PROTECTED_CLAIMS = ['iss', 'sub', 'iat', 'exp', 'jti', 'sid'] as const;

export type ProtectedClaim = (typeof PROTECTED_CLAIMS)[number];

/**
 * Claims checked for presence after decoding unless the configuration says
 * otherwise.
 */
export const DEFAULT_REQUIRED_CLAIMS: readonly string[] = ['iss', 'jti', 'exp', 'iat', 'typ', 'sub'];

/** Token type written by default and the only one `decode` accepts. */
export const ACCESS_TOKEN_TYPE = 'access';

/** Seconds `nbf` is back-dated from `iat` to absorb clock drift. */
export const CLOCK_SKEW_SECONDS = 5;

/**
 * JOSE header of a compact token.
 */
export interface JWTHeader {
  typ: 'JWT';
  alg: Algorithm;
}

/**
 * Key material for one algorithm.
 *
 * For HMAC algorithms both fields hold the same shared secret.
 */
export interface KeyMaterial {
  algorithm: Algorithm;
  /** PEM private key, or the shared secret for HMAC. */
  privateKey: string;
  /** PEM public key, or the shared secret for HMAC. */
  publicKey: string;
}

// ============================================================================
// COLLABORATORS
// ============================================================================

/**
 * Source of the current time in whole seconds since the epoch.
 */
export interface Clock {
  now(): number;
}

/**
 * Produces a fresh time-ordered unique identifier.
 */
export type IdGenerator = () => string;

// ============================================================================
// ERROR TYPES
// ============================================================================

/**
 * Reason attached to an `invalid-token` failure.
 *
 * - `malformed`: the token could not be parsed or its header is unusable.
 * - `not-yet-valid`: the `nbf` claim lies in the future.
 */
export type InvalidTokenReason = 'malformed' | 'not-yet-valid';

/**
 * One variant per failure kind, each carrying only the fields it needs.
 */
export type TokenErrorDetail =
  | { kind: 'expired-token' }
  | { kind: 'invalid-signature' }
  | { kind: 'invalid-token'; reason: InvalidTokenReason }
  | { kind: 'invalid-claim'; claim: string; actual: unknown; expected: unknown }
  | { kind: 'missing-claims'; claims: string[] }
  | { kind: 'signing-error' };

export type TokenErrorKind = TokenErrorDetail['kind'];

/**
 * Recommended caller action for a given failure.
 *
 * - `renew`: exchange a refresh token for a new access token.
 * - `reauth`: require the principal to authenticate again.
 * - `none`: no automated action; the token is not meant for this consumer.
 */
export type TokenErrorAction = 'renew' | 'reauth' | 'none';

/**
 * Maps failure kinds to stable, machine-readable keys suitable for API
 * responses and i18n lookups.
 */
export const TOKEN_ERROR_KEYS: Record<TokenErrorKind, string> = {
  'expired-token': 'expiredToken',
  'invalid-signature': 'invalidSignature',
  'invalid-token': 'invalidToken',
  'invalid-claim': 'invalidClaim',
  'missing-claims': 'missingClaims',
  'signing-error': 'signingError',
};

/**
 * Maps failure kinds to HTTP status codes.
 */
export const TOKEN_ERROR_STATUS: Record<TokenErrorKind, number> = {
  'expired-token': 401,
  'invalid-signature': 401,
  'invalid-token': 401,
  'invalid-claim': 403,
  'missing-claims': 401,
  'signing-error': 500,
};

/**
 * Maps failure kinds to recommended caller actions.
 */
export const TOKEN_ERROR_ACTIONS: Record<TokenErrorKind, TokenErrorAction> = {
  'expired-token': 'renew',
  'invalid-signature': 'reauth',
  'invalid-token': 'reauth',
  'invalid-claim': 'none',
  'missing-claims': 'reauth',
  'signing-error': 'none',
};

/**
 * Constant error messages for TokenError.
 */
export const TOKEN_ERROR_MESSAGES = {
  EXPIRED_TOKEN: 'Token has expired',
  INVALID_SIGNATURE: 'Token signature verification failed. The public key could not validate this token.',
  INVALID_TOKEN: 'Token is invalid',
  NOT_YET_VALID: 'Token is not yet valid',
  WRONG_SEGMENT_COUNT: 'Wrong number of segments',
  MALFORMED_SEGMENT: 'Malformed base64url segment',
  MALFORMED_JSON: 'Syntax error, malformed JSON',
  HEADER_NOT_OBJECT: 'Header must be a JSON object',
  PAYLOAD_NOT_OBJECT: 'Payload must be a JSON object',
  EMPTY_ALGORITHM: 'Empty algorithm',
  ALGORITHM_NOT_SUPPORTED: 'Algorithm not supported',
  INCORRECT_KEY_FOR_ALGORITHM: 'Incorrect key for this algorithm',
  NO_TOKEN_PROVIDED: 'No token provided',
  EMPTY_SUBJECT: 'Token subject must be a non-empty string',
  SIGNING_FAILED: 'Failed to sign token',
} as const;

/**
 * Helper functions for dynamic error messages.
 */
export const TOKEN_ERROR_MESSAGE_HELPERS = {
  invalidClaim: (claim: string, actual: unknown, expected: unknown): string => {
    let message = `Invalid claim "${claim}": got "${formatClaimValue(actual)}"`;
    if (expected !== null && expected !== undefined) {
      message += `, expected "${formatClaimValue(expected)}"`;
    }
    return message;
  },

  missingClaims: (claims: string[]): string =>
    `Token is missing required claims: ${claims.join(', ')}`,

  numericClaim: (claim: string): string => `Payload ${claim} must be a number`,

  keyMismatch: (algorithm: string, detail: string): string =>
    `Key material is not usable for ${algorithm}: ${detail}`,
} as const;

function formatClaimValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function defaultMessage(detail: TokenErrorDetail): string {
  switch (detail.kind) {
    case 'expired-token':
      return TOKEN_ERROR_MESSAGES.EXPIRED_TOKEN;
    case 'invalid-signature':
      return TOKEN_ERROR_MESSAGES.INVALID_SIGNATURE;
    case 'invalid-token':
      return detail.reason === 'not-yet-valid'
        ? TOKEN_ERROR_MESSAGES.NOT_YET_VALID
        : TOKEN_ERROR_MESSAGES.INVALID_TOKEN;
    case 'invalid-claim':
      return TOKEN_ERROR_MESSAGE_HELPERS.invalidClaim(detail.claim, detail.actual, detail.expected);
    case 'missing-claims':
      return TOKEN_ERROR_MESSAGE_HELPERS.missingClaims(detail.claims);
    case 'signing-error':
      return TOKEN_ERROR_MESSAGES.SIGNING_FAILED;
  }
}

/**
 * Structured token error.
 *
 * Every failure the library raises is a `TokenError`; callers branch on
 * `kind` (or narrow `detail`) instead of on subclasses. The derived metadata
 * (`errorKey`, `httpStatus`, `action`) comes from the tables above.
 */
export class TokenError extends Error {
  public readonly detail: TokenErrorDetail;
  public readonly kind: TokenErrorKind;
  public readonly errorKey: string;
  public readonly httpStatus: number;
  public readonly action: TokenErrorAction;
  /** Wall-clock epoch seconds at construction, independent of any injected `Clock`. */
  public readonly timestamp: number;

  constructor(detail: TokenErrorDetail, message?: string, options?: { cause?: unknown }) {
    super(message || defaultMessage(detail), options);
    this.name = 'TokenError';
    this.detail = detail;
    this.kind = detail.kind;
    this.errorKey = TOKEN_ERROR_KEYS[detail.kind];
    this.httpStatus = TOKEN_ERROR_STATUS[detail.kind];
    this.action = TOKEN_ERROR_ACTIONS[detail.kind];
    this.timestamp = Math.floor(Date.now() / 1000);
  }

  static expired(): TokenError {
    return new TokenError({ kind: 'expired-token' });
  }

  static invalidSignature(): TokenError {
    return new TokenError({ kind: 'invalid-signature' });
  }

  static malformed(message: string = TOKEN_ERROR_MESSAGES.INVALID_TOKEN): TokenError {
    return new TokenError({ kind: 'invalid-token', reason: 'malformed' }, message);
  }

  static notYetValid(): TokenError {
    return new TokenError({ kind: 'invalid-token', reason: 'not-yet-valid' });
  }

  static invalidClaim(claim: string, actual: unknown, expected: unknown = null): TokenError {
    return new TokenError({ kind: 'invalid-claim', claim, actual: actual ?? null, expected: expected ?? null });
  }

  static missingClaims(claims: string[]): TokenError {
    return new TokenError({ kind: 'missing-claims', claims: [...claims] });
  }

  static signing(message: string = TOKEN_ERROR_MESSAGES.SIGNING_FAILED, cause?: unknown): TokenError {
    return new TokenError({ kind: 'signing-error' }, message, cause === undefined ? undefined : { cause });
  }

  toJSON() {
    return {
      error: this.errorKey,
      kind: this.kind,
      message: this.message,
      action: this.action,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Type guard for `TokenError`.
 */
export function isTokenError(error: unknown): error is TokenError {
  return error instanceof TokenError;
}

// ============================================================================
// RESULT TYPES
// ============================================================================

/**
 * Everything `issue` produced, returned together so callers need no shared
 * state to learn the identifiers of the token they just minted.
 */
export interface IssuedToken {
  token: string;
  jti: string;
  sid: string;
  issuedAt: number;
  expiresAt: number;
}
