/**
 * @fileoverview jwt-session-kit
 * @description Issue and validate signed JWTs for session and identity
 * propagation between HTTP services.
 *
 * The package consists of:
 * - **Crypto Utilities**: node:crypto signing, key loading and key generation
 * - **Config**: immutable `TokenConfig` with zod-checked file loading
 * - **Tokens**: `TokenManager`, the `Signer` capability, claim validators and `TokenPayload`
 * - **Middleware**: Express.js bearer token authentication
 *
 * @example
 * ```typescript
 * import { TokenConfig, TokenManager } from 'jwt-session-kit';
 *
 * const manager = new TokenManager(new TokenConfig({ privateKey, publicKey, issuer: 'auth' }));
 * const token = manager.encode('user-123', { role: 'admin' });
 * manager.decode(token).getClaim('role'); // 'admin'
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// TYPES & ERRORS
// ============================================================================

export * from './types';

// ============================================================================
// CRYPTO UTILITIES
// ============================================================================

export {
  // Algorithms
  ALGORITHM_CONFIG,
  KeyType,
  HashAlgorithm,
  ECCurve,
  DEFAULT_RSA_MODULUS_LENGTH,
  DEFAULT_HMAC_SECRET_LENGTH,
  isAlgorithm,
  parseAlgorithm,
  isSymmetric,
  isAsymmetric,
  isRSA,
  isECDSA,

  // Key generation
  generateSecret,
  generateKeyPair,
  generateRSAKeyPair,
  generateECKeyPair,
  generateEdDSAKeyPair,

  // Key loading
  loadSigningKey,
  loadVerificationKey,

  // Encoding
  base64urlEncode,
  base64urlDecode,
  encodeJSON,
  decodeJSON,

  // Hashing
  sha1Hex,
} from './crypto';

export type { AlgorithmConfig } from './crypto';

// ============================================================================
// CONFIG
// ============================================================================

export {
  TokenConfig,
  loadConfigFile,
  DEFAULT_TTL_MINUTES,
  DEFAULT_REFRESH_TTL_MINUTES,
  DEFAULT_ALGORITHM,
} from './config/token-config';

export type { TokenConfigOptions, TokenConfigInput } from './config/token-config';

// ============================================================================
// TOKENS
// ============================================================================

export {
  TokenManager,
  systemClock,
  TokenPayload,
  NodeCryptoSigner,
  decodeToken,
  validateClaims,
  checkRequiredClaims,
  checkIssuer,
  checkAudience,
  checkTokenType,
  isEmptyClaim,
} from './tokens';

export type {
  TokenManagerOptions,
  VerificationResult,
  Signer,
  DecodedToken,
  ClaimCheck,
  ClaimRules,
} from './tokens';

// ============================================================================
// LOGGING
// ============================================================================

export { createLogger, resolveLogLevel, LOG_LEVEL_ENV } from './logging';

export type { Logger, LogLevel } from './logging';

// ============================================================================
// MIDDLEWARE
// ============================================================================

export { tokenAuth, optionalTokenAuth, extractBearerToken } from './middleware/express';

export type { TokenAuthOptions } from './middleware/express';

// ============================================================================
// VERSION
// ============================================================================

/**
 * @constant VERSION
 * @description Current package version
 */
export const VERSION = '1.0.0';
