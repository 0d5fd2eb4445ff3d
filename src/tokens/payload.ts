/**
 * jwt-session-kit - TokenPayload
 * Read-only typed view over a verified claim set
 */

import { ACCESS_TOKEN_TYPE, ClaimSet, TokenError } from '../types';
import { readClaim } from './claims';

/**
 * Wraps the claims of a token that passed signature, time-window and claim
 * validation. The manager's `decode` is its only producer in this library.
 *
 * @example
 * ```typescript
 * const payload = manager.decode(token);
 * payload.getSubject();       // 'user-123'
 * payload.getClaim('role');   // 'admin'
 * ```
 */
export class TokenPayload {
  private readonly claims: Readonly<ClaimSet>;

  constructor(claims: ClaimSet) {
    this.claims = Object.freeze({ ...claims });
  }

  private string(name: string): string {
    const value = readClaim(this.claims, name);
    if (typeof value !== 'string') {
      throw TokenError.invalidClaim(name, value);
    }
    return value;
  }

  private timestamp(name: string): number {
    const value = readClaim(this.claims, name);
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw TokenError.invalidClaim(name, value);
    }
    return value;
  }

  /** Subject (`sub`), typically the user id. */
  getSubject(): string {
    return this.string('sub');
  }

  getIssuer(): string {
    return this.string('iss');
  }

  /**
   * Audience (`aud`) as a list; a bare string is wrapped, an absent claim
   * yields an empty list.
   */
  getAudience(): string[] {
    const aud = this.claims.aud;
    if (aud === undefined || aud === null) {
      return [];
    }
    const values: unknown[] = Array.isArray(aud) ? aud : [aud];
    if (values.every((v): v is string => typeof v === 'string')) {
      return [...values];
    }
    throw TokenError.invalidClaim('aud', aud);
  }

  getJti(): string {
    return this.string('jti');
  }

  getSessionId(): string | null {
    return this.hasClaim('sid') ? this.string('sid') : null;
  }

  getType(): string {
    return this.hasClaim('typ') ? this.string('typ') : ACCESS_TOKEN_TYPE;
  }

  getIssuedAt(): number {
    return this.timestamp('iat');
  }

  getNotBefore(): number {
    return this.timestamp('nbf');
  }

  getExpiration(): number {
    return this.timestamp('exp');
  }

  /** `now` defaults to wall-clock time; pass the manager's clock reading to agree with `decode`. */
  isExpired(now: number = Math.floor(Date.now() / 1000)): boolean {
    return now > this.getExpiration();
  }

  /** Any claim by name, `null` when absent. */
  getClaim(name: string): unknown {
    return readClaim(this.claims, name) ?? null;
  }

  hasClaim(name: string): boolean {
    const value = readClaim(this.claims, name);
    return value !== undefined && value !== null;
  }

  toObject(): ClaimSet {
    return { ...this.claims };
  }

  toJSON(): ClaimSet {
    return this.toObject();
  }
}
