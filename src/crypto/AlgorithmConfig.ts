// ============================================================================
// CRYPTOGRAPHIC CONSTANTS
// ============================================================================

import { Algorithm, EcdsaAlgorithm, HmacAlgorithm, RsaPssAlgorithm } from '../types';
import * as crypto from 'crypto';

/**
 * @enum KeyType
 * @description Key shape each algorithm family signs with.
 */
export enum KeyType {
  HMAC = 'hmac',
  RSA = 'rsa',
  RSA_PSS = 'rsa-pss',
  EC = 'ec',
  EDDSA = 'eddsa',
}

/**
 * @enum HashAlgorithm
 * @description Digests used by the hashed signature families.
 */
export enum HashAlgorithm {
  SHA256 = 'sha256',
  SHA384 = 'sha384',
  SHA512 = 'sha512',
}

/**
 * @enum ECCurve
 * @description OpenSSL names of the curves ECDSA algorithms are bound to.
 */
export enum ECCurve {
  P256 = 'prime256v1',
  P384 = 'secp384r1',
  P521 = 'secp521r1',
}

/**
 * @constant HMAC_HASHES
 * @description Digest behind each HMAC algorithm.
 */
export const HMAC_HASHES: Readonly<Record<HmacAlgorithm, HashAlgorithm>> = {
  [Algorithm.HS256]: HashAlgorithm.SHA256,
  [Algorithm.HS384]: HashAlgorithm.SHA384,
  [Algorithm.HS512]: HashAlgorithm.SHA512,
} as const;

/**
 * @constant EC_CURVES
 * @description Curve each ECDSA algorithm is bound to.
 */
export const EC_CURVES: Readonly<Record<EcdsaAlgorithm, ECCurve>> = {
  [Algorithm.ES256]: ECCurve.P256,
  [Algorithm.ES384]: ECCurve.P384,
  [Algorithm.ES512]: ECCurve.P521,
} as const;

/**
 * @constant EC_SIGNATURE_SIZES
 * @description Byte size of each of `r` and `s` in a JOSE ECDSA signature.
 */
export const EC_SIGNATURE_SIZES: Readonly<Record<EcdsaAlgorithm, number>> = {
  [Algorithm.ES256]: 32,
  [Algorithm.ES384]: 48,
  [Algorithm.ES512]: 66,
} as const;

/**
 * @constant SALT_LENGTHS
 * @description Salt lengths for RSA-PSS algorithms (equal to the digest size).
 */
export const SALT_LENGTHS: Readonly<Record<RsaPssAlgorithm, number>> = {
  [Algorithm.PS256]: 32,
  [Algorithm.PS384]: 48,
  [Algorithm.PS512]: 64,
} as const;

/**
 * @constant DEFAULT_RSA_MODULUS_LENGTH
 * @description Default RSA key size in bits.
 */
export const DEFAULT_RSA_MODULUS_LENGTH = 2048;

/**
 * @constant DEFAULT_HMAC_SECRET_LENGTH
 * @description Length in bytes of generated HMAC secrets.
 */
export const DEFAULT_HMAC_SECRET_LENGTH = 64;

// ============================================================================
// ALGORITHM CONFIGURATION
// ============================================================================

/**
 * @interface AlgorithmConfig
 * @description Cryptographic parameters for one algorithm.
 */
export interface AlgorithmConfig {
  type: KeyType;
  /** Absent for EdDSA, which hashes internally. */
  hash?: HashAlgorithm;
  curve?: ECCurve;
  padding?: number;
  saltLength?: number;
}

/**
 * @constant ALGORITHM_CONFIG
 * @description Parameter table the signer dispatches on. Defines the key type,
 * digest, curve (for ECDSA) and padding scheme (for RSA) of every algorithm.
 */
export const ALGORITHM_CONFIG: Readonly<Record<Algorithm, AlgorithmConfig>> = {
  [Algorithm.HS256]: { type: KeyType.HMAC, hash: HMAC_HASHES[Algorithm.HS256] },
  [Algorithm.HS384]: { type: KeyType.HMAC, hash: HMAC_HASHES[Algorithm.HS384] },
  [Algorithm.HS512]: { type: KeyType.HMAC, hash: HMAC_HASHES[Algorithm.HS512] },
  [Algorithm.RS256]: { type: KeyType.RSA, hash: HashAlgorithm.SHA256, padding: crypto.constants.RSA_PKCS1_PADDING },
  [Algorithm.RS384]: { type: KeyType.RSA, hash: HashAlgorithm.SHA384, padding: crypto.constants.RSA_PKCS1_PADDING },
  [Algorithm.RS512]: { type: KeyType.RSA, hash: HashAlgorithm.SHA512, padding: crypto.constants.RSA_PKCS1_PADDING },
  [Algorithm.ES256]: { type: KeyType.EC, hash: HashAlgorithm.SHA256, curve: EC_CURVES[Algorithm.ES256] },
  [Algorithm.ES384]: { type: KeyType.EC, hash: HashAlgorithm.SHA384, curve: EC_CURVES[Algorithm.ES384] },
  [Algorithm.ES512]: { type: KeyType.EC, hash: HashAlgorithm.SHA512, curve: EC_CURVES[Algorithm.ES512] },
  [Algorithm.PS256]: { type: KeyType.RSA_PSS, hash: HashAlgorithm.SHA256, padding: crypto.constants.RSA_PKCS1_PSS_PADDING, saltLength: SALT_LENGTHS[Algorithm.PS256] },
  [Algorithm.PS384]: { type: KeyType.RSA_PSS, hash: HashAlgorithm.SHA384, padding: crypto.constants.RSA_PKCS1_PSS_PADDING, saltLength: SALT_LENGTHS[Algorithm.PS384] },
  [Algorithm.PS512]: { type: KeyType.RSA_PSS, hash: HashAlgorithm.SHA512, padding: crypto.constants.RSA_PKCS1_PSS_PADDING, saltLength: SALT_LENGTHS[Algorithm.PS512] },
  [Algorithm.EdDSA]: { type: KeyType.EDDSA },
} as const;

// ============================================================================
// ALGORITHM PREDICATES
// ============================================================================

const ALGORITHM_VALUES: ReadonlySet<string> = new Set(Object.values(Algorithm));

/**
 * Type guard for algorithm identifiers coming from untrusted input
 * (token headers, config files, CLI flags).
 */
export function isAlgorithm(value: unknown): value is Algorithm {
  return typeof value === 'string' && ALGORITHM_VALUES.has(value);
}

/**
 * Parse an algorithm identifier, throwing on anything outside the tag set.
 */
export function parseAlgorithm(value: string): Algorithm {
  if (!isAlgorithm(value)) {
    throw new Error(`Unsupported algorithm: ${value}`);
  }
  return value;
}

/** HMAC algorithms: one shared secret signs and verifies. */
export function isSymmetric(algorithm: Algorithm): algorithm is HmacAlgorithm {
  return ALGORITHM_CONFIG[algorithm].type === KeyType.HMAC;
}

export function isAsymmetric(algorithm: Algorithm): boolean {
  return !isSymmetric(algorithm);
}

/** RSA PKCS#1 v1.5 and RSA-PSS. */
export function isRSA(algorithm: Algorithm): boolean {
  const { type } = ALGORITHM_CONFIG[algorithm];
  return type === KeyType.RSA || type === KeyType.RSA_PSS;
}

export function isECDSA(algorithm: Algorithm): algorithm is EcdsaAlgorithm {
  return ALGORITHM_CONFIG[algorithm].type === KeyType.EC;
}
