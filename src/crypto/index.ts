/**
 * jwt-session-kit - Crypto Utilities
 * Native Node.js crypto implementation of the thirteen signing algorithms
 */

import * as crypto from 'crypto';
import { Algorithm, EcdsaAlgorithm, KeyMaterial, TokenError, TOKEN_ERROR_MESSAGE_HELPERS } from '../types';
import {
  ALGORITHM_CONFIG,
  AlgorithmConfig,
  DEFAULT_HMAC_SECRET_LENGTH,
  DEFAULT_RSA_MODULUS_LENGTH,
  EC_CURVES,
  EC_SIGNATURE_SIZES,
  HMAC_HASHES,
  KeyType,
  isECDSA,
  isSymmetric,
} from './AlgorithmConfig';

export * from './AlgorithmConfig';

// ============================================================================
// BASE64URL UTILITIES
// ============================================================================

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

/**
 * Encode buffer to base64url
 */
export function base64urlEncode(data: Buffer | string): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return buffer
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '');
}

/**
 * Decode base64url to buffer
 */
export function base64urlDecode(str: string): Buffer {
  // Add padding if needed
  let padded = str.replace(/-/g, '+').replace(/_/g, '/');
  const padding = padded.length % 4;
  if (padding === 2) {
    padded += '==';
  } else if (padding === 3) {
    padded += '=';
  }
  return Buffer.from(padded, 'base64');
}

/**
 * Whether a string is unpadded base64url of a length that decodes to whole
 * bytes. Unused trailing bits are not checked.
 * `Buffer.from` silently skips foreign characters, so callers that must
 * reject garbage check this first.
 */
export function isBase64url(str: string): boolean {
  return BASE64URL_PATTERN.test(str) && str.length % 4 !== 1;
}

/**
 * Encode object to base64url JSON
 */
export function encodeJSON(obj: unknown): string {
  return base64urlEncode(JSON.stringify(obj));
}

/**
 * Decode base64url JSON. Throws `SyntaxError` when the bytes are not JSON.
 */
export function decodeJSON(str: string): unknown {
  return JSON.parse(base64urlDecode(str).toString('utf8'));
}

// ============================================================================
// KEY LOADING
// ============================================================================

const PEM_MARKER = '-----BEGIN';

function keyMismatch(algorithm: Algorithm, detail: string, cause?: unknown): TokenError {
  return TokenError.signing(TOKEN_ERROR_MESSAGE_HELPERS.keyMismatch(algorithm, detail), cause);
}

function loadSecret(secret: string, algorithm: Algorithm): crypto.KeyObject {
  if (secret.includes(PEM_MARKER)) {
    throw keyMismatch(algorithm, 'expected a shared secret, got a PEM key');
  }
  if (secret.length === 0) {
    throw keyMismatch(algorithm, 'shared secret is empty');
  }
  return crypto.createSecretKey(Buffer.from(secret, 'utf8'));
}

/**
 * Check that an asymmetric key belongs to the family (and curve) the
 * algorithm signs with.
 */
function assertKeyShape(key: crypto.KeyObject, algorithm: Algorithm, config: AlgorithmConfig): void {
  const keyType = key.asymmetricKeyType;

  switch (config.type) {
    case KeyType.RSA:
      if (keyType !== 'rsa') {
        throw keyMismatch(algorithm, `expected an RSA key, got ${keyType ?? 'unknown'}`);
      }
      return;
    case KeyType.RSA_PSS:
      if (keyType !== 'rsa' && keyType !== 'rsa-pss') {
        throw keyMismatch(algorithm, `expected an RSA key, got ${keyType ?? 'unknown'}`);
      }
      return;
    case KeyType.EC: {
      if (keyType !== 'ec') {
        throw keyMismatch(algorithm, `expected an EC key, got ${keyType ?? 'unknown'}`);
      }
      const curve = key.asymmetricKeyDetails?.namedCurve;
      if (curve !== config.curve) {
        throw keyMismatch(algorithm, `expected curve ${config.curve}, got ${curve ?? 'unknown'}`);
      }
      return;
    }
    case KeyType.EDDSA:
      if (keyType !== 'ed25519' && keyType !== 'ed448') {
        throw keyMismatch(algorithm, `expected an Ed25519 or Ed448 key, got ${keyType ?? 'unknown'}`);
      }
      return;
    case KeyType.HMAC:
      return;
  }
}

/**
 * Load the key used to sign with `algorithm`.
 *
 * @throws {TokenError} `signing-error` when the material cannot be parsed or
 * belongs to another algorithm family.
 */
export function loadSigningKey(key: string, algorithm: Algorithm): crypto.KeyObject {
  if (isSymmetric(algorithm)) {
    return loadSecret(key, algorithm);
  }

  let keyObject: crypto.KeyObject;
  try {
    keyObject = crypto.createPrivateKey(key);
  } catch (error) {
    throw keyMismatch(algorithm, 'unable to parse private key', error);
  }
  assertKeyShape(keyObject, algorithm, ALGORITHM_CONFIG[algorithm]);
  return keyObject;
}

/**
 * Load the key used to verify `algorithm` signatures. A private key PEM is
 * accepted and its public half used.
 *
 * @throws {TokenError} `signing-error` on unusable key material.
 */
export function loadVerificationKey(key: string, algorithm: Algorithm): crypto.KeyObject {
  if (isSymmetric(algorithm)) {
    return loadSecret(key, algorithm);
  }

  let keyObject: crypto.KeyObject;
  try {
    keyObject = crypto.createPublicKey(key);
  } catch (error) {
    throw keyMismatch(algorithm, 'unable to parse public key', error);
  }
  assertKeyShape(keyObject, algorithm, ALGORITHM_CONFIG[algorithm]);
  return keyObject;
}

// ============================================================================
// KEY GENERATION
// ============================================================================

/**
 * Generate a random shared secret for HMAC algorithms
 */
export function generateSecret(length: number = DEFAULT_HMAC_SECRET_LENGTH): string {
  return base64urlEncode(crypto.randomBytes(length));
}

/**
 * Generate a new RSA key pair (usable for RS* and PS*)
 */
export async function generateRSAKeyPair(
  algorithm: Algorithm = Algorithm.RS256,
  modulusLength: number = DEFAULT_RSA_MODULUS_LENGTH
): Promise<KeyMaterial> {
  return new Promise((resolve, reject) => {
    crypto.generateKeyPair(
      'rsa',
      {
        modulusLength,
        publicKeyEncoding: { type: 'spki', format: 'pem' },
        privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
      },
      (err, publicKey, privateKey) => {
        if (err) {
          reject(err);
        } else {
          resolve({ algorithm, publicKey, privateKey });
        }
      }
    );
  });
}

/**
 * Generate a new EC key pair on the curve the algorithm requires
 */
export async function generateECKeyPair(algorithm: EcdsaAlgorithm = Algorithm.ES256): Promise<KeyMaterial> {
  return new Promise((resolve, reject) => {
    crypto.generateKeyPair(
      'ec',
      {
        namedCurve: EC_CURVES[algorithm],
        publicKeyEncoding: { type: 'spki', format: 'pem' },
        privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
      },
      (err, publicKey, privateKey) => {
        if (err) {
          reject(err);
        } else {
          resolve({ algorithm, publicKey, privateKey });
        }
      }
    );
  });
}

/**
 * Generate a new Ed25519 key pair
 */
export async function generateEdDSAKeyPair(): Promise<KeyMaterial> {
  return new Promise((resolve, reject) => {
    crypto.generateKeyPair(
      'ed25519',
      {
        publicKeyEncoding: { type: 'spki', format: 'pem' },
        privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
      },
      (err, publicKey, privateKey) => {
        if (err) {
          reject(err);
        } else {
          resolve({ algorithm: Algorithm.EdDSA, publicKey, privateKey });
        }
      }
    );
  });
}

/**
 * Generate key material based on algorithm. HMAC algorithms get one random
 * secret in both fields.
 */
export async function generateKeyPair(
  algorithm: Algorithm = Algorithm.RS256,
  modulusLength: number = DEFAULT_RSA_MODULUS_LENGTH
): Promise<KeyMaterial> {
  if (isSymmetric(algorithm)) {
    const secret = generateSecret();
    return { algorithm, privateKey: secret, publicKey: secret };
  }
  if (isECDSA(algorithm)) {
    return generateECKeyPair(algorithm);
  }
  if (algorithm === Algorithm.EdDSA) {
    return generateEdDSAKeyPair();
  }
  return generateRSAKeyPair(algorithm, modulusLength);
}

// ============================================================================
// SIGNING
// ============================================================================

function hmac(data: string | Buffer, key: crypto.KeyObject, algorithm: keyof typeof HMAC_HASHES): Buffer {
  return crypto.createHmac(HMAC_HASHES[algorithm], key).update(data).digest();
}

function keyInput(key: crypto.KeyObject, config: AlgorithmConfig): crypto.SignKeyObjectInput {
  switch (config.type) {
    case KeyType.RSA:
      return { key, padding: config.padding };
    case KeyType.RSA_PSS:
      return { key, padding: config.padding, saltLength: config.saltLength };
    case KeyType.EC:
      // JOSE carries r||s, not DER
      return { key, dsaEncoding: 'ieee-p1363' };
    default:
      return { key };
  }
}

/**
 * Sign data with a key loaded by `loadSigningKey`
 */
export function sign(data: string | Buffer, key: crypto.KeyObject, algorithm: Algorithm): Buffer {
  if (isSymmetric(algorithm)) {
    return hmac(data, key, algorithm);
  }

  const config = ALGORITHM_CONFIG[algorithm];
  const input = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return crypto.sign(config.hash ?? null, input, keyInput(key, config));
}

/**
 * Verify a signature with a key loaded by `loadVerificationKey`
 */
export function verify(
  data: string | Buffer,
  signature: Buffer,
  key: crypto.KeyObject,
  algorithm: Algorithm
): boolean {
  if (isSymmetric(algorithm)) {
    const expected = hmac(data, key, algorithm);
    return expected.length === signature.length && crypto.timingSafeEqual(expected, signature);
  }

  if (isECDSA(algorithm) && signature.length !== EC_SIGNATURE_SIZES[algorithm] * 2) {
    return false;
  }

  const config = ALGORITHM_CONFIG[algorithm];
  const input = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;

  try {
    return crypto.verify(config.hash ?? null, input, keyInput(key, config), signature);
  } catch {
    // OpenSSL rejects some malformed signatures by throwing rather than returning false
    return false;
  }
}

// ============================================================================
// HASH UTILITIES
// ============================================================================

/**
 * Create SHA-1 hash as lowercase hex string
 */
export function sha1Hex(data: string | Buffer): string {
  return crypto.createHash('sha1').update(data).digest('hex');
}
