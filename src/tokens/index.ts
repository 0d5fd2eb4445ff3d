/**
 * jwt-session-kit - Tokens
 *
 * Token issuance and validation: the `Signer` capability and its node:crypto
 * implementation, the claim validators, `TokenPayload` and `TokenManager`.
 *
 * @example
 * ```typescript
 * import { TokenManager } from 'jwt-session-kit';
 *
 * const manager = new TokenManager(config);
 * const result = manager.verify(token);
 * if (!result.valid) {
 *   console.log(result.error.errorKey);
 * }
 * ```
 */

export * from './signer';
export * from './claims';
export * from './payload';
export * from './token-manager';
