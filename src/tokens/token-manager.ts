/**
 * jwt-session-kit - Token Manager
 * Issues and validates access tokens for one configuration
 */

import { v7 as uuidv7 } from 'uuid';
import { sha1Hex } from '../crypto';
import { TokenConfig } from '../config/token-config';
import { createLogger, Logger } from '../logging';
import {
  ACCESS_TOKEN_TYPE,
  CLOCK_SKEW_SECONDS,
  ClaimSet,
  Clock,
  IdGenerator,
  IssuedToken,
  TokenError,
  TOKEN_ERROR_MESSAGES,
  isTokenError,
} from '../types';
import { validateClaims } from './claims';
import { TokenPayload } from './payload';
import { NodeCryptoSigner, Signer } from './signer';

/**
 * Wall clock in whole epoch seconds.
 */
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

export interface TokenManagerOptions {
  /** Signing backend (default: NodeCryptoSigner) */
  signer?: Signer;
  /** Time source (default: systemClock) */
  clock?: Clock;
  /** Identifier source for `jti` and `sid` (default: UUID v7) */
  generateId?: IdGenerator;
  logger?: Logger;
}

export type VerificationResult =
  | { valid: true; payload: TokenPayload }
  | { valid: false; error: TokenError };

/**
 * Token manager.
 *
 * Claims are assembled as defaults, then caller claims, then the protected
 * set (`iss`, `sub`, `iat`, `exp`, `jti`, `sid`), so a caller can override
 * `aud`, `typ` and `nbf` but never an identity or lifetime claim.
 *
 * @example
 * ```typescript
 * const manager = new TokenManager(config);
 *
 * const { token, sid } = manager.issue('user-123', { role: 'admin' });
 * const payload = manager.decode(token);
 * payload.getClaim('role'); // 'admin'
 * ```
 */
export class TokenManager {
  private readonly config: TokenConfig;
  private readonly signer: Signer;
  private readonly clock: Clock;
  private readonly generateId: IdGenerator;
  private readonly logger: Logger;

  private lastJti: string | null = null;
  private lastSessionId: string | null = null;

  constructor(config: TokenConfig, options: TokenManagerOptions = {}) {
    this.config = config;
    this.signer = options.signer ?? new NodeCryptoSigner();
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? (() => uuidv7());
    this.logger = options.logger ?? createLogger('token-manager');
  }

  // ==========================================================================
  // ISSUANCE
  // ==========================================================================

  /**
   * Mint a signed access token.
   *
   * @throws {TokenError} `signing-error` for an empty subject or key material
   * that does not fit the configured algorithm
   */
  issue(subject: string, customClaims: ClaimSet = {}): IssuedToken {
    if (typeof subject !== 'string' || subject.length === 0) {
      throw TokenError.signing(TOKEN_ERROR_MESSAGES.EMPTY_SUBJECT);
    }

    const now = this.clock.now();
    const jti = this.generateId();
    const sid = this.generateId();
    const expiresAt = now + this.config.ttlSeconds;

    const defaults: ClaimSet = {
      typ: ACCESS_TOKEN_TYPE,
      nbf: now - CLOCK_SKEW_SECONDS,
    };
    if (this.config.audience !== null) {
      defaults.aud = [...this.config.audience];
    }

    const protectedClaims: ClaimSet = {
      iss: this.config.issuer,
      sub: subject,
      iat: now,
      exp: expiresAt,
      jti,
      sid,
    };

    const claims: ClaimSet = { ...defaults, ...customClaims, ...protectedClaims };
    const token = this.signer.sign(claims, this.config.algorithm, this.config.privateKey);

    this.logger.debug(
      { sub: subject, jti, sid, exp: expiresAt, alg: this.config.algorithm },
      'Token issued'
    );

    return { token, jti, sid, issuedAt: now, expiresAt };
  }

  /**
   * Mint a token and return only the compact string. The identifiers are
   * kept as "last generated" state; prefer `issue` when the same manager
   * encodes concurrently.
   */
  encode(subject: string, customClaims: ClaimSet = {}): string {
    const issued = this.issue(subject, customClaims);
    this.lastJti = issued.jti;
    this.lastSessionId = issued.sid;
    return issued.token;
  }

  getLastJti(): string | null {
    return this.lastJti;
  }

  getLastSessionId(): string | null {
    return this.lastSessionId;
  }

  // ==========================================================================
  // VALIDATION
  // ==========================================================================

  /**
   * Verify signature and time window, then run the claim checks.
   *
   * @throws {TokenError} the first failure, in pipeline order
   */
  decode(token: string): TokenPayload {
    const claims = this.signer.verify(
      token,
      this.config.algorithm,
      this.config.publicKey,
      this.clock.now()
    );

    const check = validateClaims(claims, this.config);
    if (!check.ok) {
      throw check.error;
    }

    return new TokenPayload(claims);
  }

  /**
   * `decode` as a result value. Only `TokenError`s are captured.
   */
  verify(token: string): VerificationResult {
    try {
      return { valid: true, payload: this.decode(token) };
    } catch (error) {
      if (isTokenError(error)) {
        return { valid: false, error };
      }
      throw error;
    }
  }

  // ==========================================================================
  // REFRESH TOKENS & LIFETIMES
  // ==========================================================================

  /**
   * Opaque refresh token: hex SHA-1 of the current epoch second. Two calls
   * in the same second return the same value.
   */
  generateRefreshToken(): string {
    return sha1Hex(String(this.clock.now()));
  }

  getTokenTtlSeconds(): number {
    return this.config.ttlSeconds;
  }

  getRefreshTokenTtlSeconds(): number {
    return this.config.refreshTtlSeconds;
  }
}
