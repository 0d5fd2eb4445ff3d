/**
 * jwt-session-kit - Claim Validation
 *
 * Semantic checks run on a claim set after its signature and time window
 * have been verified. Each check is a pure function returning a `ClaimCheck`,
 * so the rules can be exercised without any key material.
 */

import { ACCESS_TOKEN_TYPE, ClaimSet, TokenError } from '../types';

export type ClaimCheck = { ok: true } | { ok: false; error: TokenError };

const PASS: ClaimCheck = { ok: true };

function fail(error: TokenError): ClaimCheck {
  return { ok: false, error };
}

/**
 * The subset of configuration the validators read.
 */
export interface ClaimRules {
  readonly issuer: string;
  readonly audience: readonly string[] | null;
  readonly requiredClaims: readonly string[];
}

/**
 * Own claim by name. Names inherited from `Object.prototype` (`constructor`,
 * `toString`) read as absent.
 */
export function readClaim(claims: Readonly<ClaimSet>, name: string): unknown {
  return Object.hasOwn(claims, name) ? claims[name] : undefined;
}

/**
 * A claim counts as missing when absent, null, the empty string or an empty
 * array.
 */
export function isEmptyClaim(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    value === '' ||
    (Array.isArray(value) && value.length === 0)
  );
}

/**
 * Collect every required claim that is missing, in configured order.
 */
export function checkRequiredClaims(claims: ClaimSet, requiredClaims: readonly string[]): ClaimCheck {
  const missing = requiredClaims.filter(name => isEmptyClaim(readClaim(claims, name)));
  return missing.length > 0 ? fail(TokenError.missingClaims(missing)) : PASS;
}

export function checkIssuer(claims: ClaimSet, issuer: string): ClaimCheck {
  return claims.iss === issuer ? PASS : fail(TokenError.invalidClaim('iss', claims.iss, issuer));
}

/**
 * Audience passes when any token audience equals any accepted one.
 * A null `audience` disables the check.
 */
export function checkAudience(claims: ClaimSet, audience: readonly string[] | null): ClaimCheck {
  if (audience === null) {
    return PASS;
  }

  const expected = [...audience];
  const aud = claims.aud;
  if (aud === undefined || aud === null) {
    return fail(TokenError.invalidClaim('aud', null, expected));
  }

  const tokenAudiences: unknown[] = Array.isArray(aud) ? aud : [aud];
  const matches = tokenAudiences.some(a => typeof a === 'string' && audience.includes(a));

  return matches ? PASS : fail(TokenError.invalidClaim('aud', aud, expected));
}

export function checkTokenType(claims: ClaimSet, expected: string = ACCESS_TOKEN_TYPE): ClaimCheck {
  return claims.typ === expected ? PASS : fail(TokenError.invalidClaim('typ', claims.typ, expected));
}

/**
 * Run the claim pipeline in its fixed order (required claims, issuer,
 * audience, token type) and return the first failure.
 */
export function validateClaims(claims: ClaimSet, rules: ClaimRules): ClaimCheck {
  const checks: Array<() => ClaimCheck> = [
    () => checkRequiredClaims(claims, rules.requiredClaims),
    () => checkIssuer(claims, rules.issuer),
    () => checkAudience(claims, rules.audience),
    () => checkTokenType(claims),
  ];

  for (const check of checks) {
    const result = check();
    if (!result.ok) {
      return result;
    }
  }
  return PASS;
}
