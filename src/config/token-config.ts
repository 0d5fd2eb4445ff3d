/**
 * jwt-session-kit - Token Configuration
 *
 * Immutable settings shared by every encode/decode call: key material,
 * algorithm, lifetimes, issuer, accepted audiences and required claims.
 * Raw input (config files, parsed JSON) is checked with zod at the boundary
 * and turned into a frozen `TokenConfig`.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Algorithm, DEFAULT_REQUIRED_CLAIMS, isClaimSet } from '../types';
import { isAlgorithm } from '../crypto';
import type { ClaimRules } from '../tokens/claims';

// ============================================================================
// DEFAULTS
// ============================================================================

/** Access token lifetime: one hour. */
export const DEFAULT_TTL_MINUTES = 60;

/** Refresh token lifetime: fourteen days. */
export const DEFAULT_REFRESH_TTL_MINUTES = 20160;

export const DEFAULT_ALGORITHM = Algorithm.RS256;

// ============================================================================
// TOKEN CONFIG
// ============================================================================

export interface TokenConfigOptions {
  /** PEM private key, or the shared secret for HMAC algorithms. */
  privateKey: string;
  /** PEM public key, or the same shared secret for HMAC algorithms. */
  publicKey: string;
  /** Value written to and required in `iss`. */
  issuer: string;
  /** Signing algorithm (default: RS256) */
  algorithm?: Algorithm;
  /** Access token lifetime in minutes (default: 60) */
  ttlMinutes?: number;
  /** Refresh token lifetime in minutes (default: 20160) */
  refreshTtlMinutes?: number;
  /**
   * Accepted audiences. A single string is treated as a one-element list;
   * `null` (the default) turns audience validation off.
   */
  audience?: string | readonly string[] | null;
  /** Claims that must be present and non-empty after decoding. */
  requiredClaims?: readonly string[];
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
}

function normalizeAudience(audience: string | readonly string[] | null | undefined): readonly string[] | null {
  if (audience === undefined || audience === null) {
    return null;
  }
  const list = typeof audience === 'string' ? [audience] : [...audience];
  if (list.length === 0) {
    throw new Error('audience must list at least one value; use null to disable audience validation');
  }
  if (list.some(a => typeof a !== 'string' || a.length === 0)) {
    throw new Error('audience entries must be non-empty strings');
  }
  return Object.freeze(list);
}

/**
 * Frozen token configuration. Safe to share between manager instances.
 *
 * @example
 * ```typescript
 * const config = new TokenConfig({
 *   privateKey,
 *   publicKey,
 *   issuer: 'https://api.example.com',
 *   audience: ['https://app.example.com'],
 * });
 * ```
 */
export class TokenConfig implements ClaimRules {
  readonly privateKey: string;
  readonly publicKey: string;
  readonly issuer: string;
  readonly algorithm: Algorithm;
  readonly ttlMinutes: number;
  readonly refreshTtlMinutes: number;
  readonly audience: readonly string[] | null;
  readonly requiredClaims: readonly string[];

  constructor(options: TokenConfigOptions) {
    const {
      privateKey,
      publicKey,
      issuer,
      algorithm = DEFAULT_ALGORITHM,
      ttlMinutes = DEFAULT_TTL_MINUTES,
      refreshTtlMinutes = DEFAULT_REFRESH_TTL_MINUTES,
      audience = null,
      requiredClaims = DEFAULT_REQUIRED_CLAIMS,
    } = options;

    if (typeof issuer !== 'string' || issuer.length === 0) {
      throw new Error('issuer must be a non-empty string');
    }
    if (!isAlgorithm(algorithm)) {
      throw new Error(`Unsupported algorithm: ${String(algorithm)}`);
    }
    assertPositiveInteger('ttlMinutes', ttlMinutes);
    assertPositiveInteger('refreshTtlMinutes', refreshTtlMinutes);

    this.privateKey = privateKey;
    this.publicKey = publicKey;
    this.issuer = issuer;
    this.algorithm = algorithm;
    this.ttlMinutes = ttlMinutes;
    this.refreshTtlMinutes = refreshTtlMinutes;
    this.audience = normalizeAudience(audience);
    this.requiredClaims = Object.freeze([...requiredClaims]);

    Object.freeze(this);
  }

  get ttlSeconds(): number {
    return this.ttlMinutes * 60;
  }

  get refreshTtlSeconds(): number {
    return this.refreshTtlMinutes * 60;
  }

  /**
   * Build a config from a snake_case record such as a parsed JSON file.
   *
   * @throws {Error} listing every schema violation
   */
  static fromObject(raw: unknown): TokenConfig {
    const parsed = TokenConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid token config: ${formatIssues(parsed.error)}`);
    }

    const data = parsed.data;
    return new TokenConfig({
      privateKey: data.private_key,
      publicKey: data.public_key,
      issuer: data.issuer,
      algorithm: data.algorithm,
      ttlMinutes: data.ttl_minutes,
      refreshTtlMinutes: data.refresh_ttl_minutes,
      audience: data.audience ?? null,
      requiredClaims: data.required_claims ?? DEFAULT_REQUIRED_CLAIMS,
    });
  }

  /**
   * Build a config whose keys are read from PEM (or secret) files.
   */
  static fromKeyFiles(
    privateKeyPath: string,
    publicKeyPath: string,
    options: Omit<TokenConfigOptions, 'privateKey' | 'publicKey'>
  ): TokenConfig {
    return new TokenConfig({
      ...options,
      privateKey: readKeyFile(privateKeyPath),
      publicKey: readKeyFile(publicKeyPath),
    });
  }
}

// ============================================================================
// PARSING
// ============================================================================

const TokenConfigSchema = z.object({
  private_key: z.string().min(1, 'private_key is required'),
  public_key: z.string().min(1, 'public_key is required'),
  issuer: z.string().min(1, 'issuer is required'),
  algorithm: z.nativeEnum(Algorithm).default(DEFAULT_ALGORITHM),
  ttl_minutes: z.number().int().positive().default(DEFAULT_TTL_MINUTES),
  refresh_ttl_minutes: z.number().int().positive().default(DEFAULT_REFRESH_TTL_MINUTES),
  audience: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).nullable().optional(),
  required_claims: z.array(z.string().min(1)).optional(),
});

const KeyFileRefsSchema = z.object({
  private_key_file: z.string().min(1).optional(),
  public_key_file: z.string().min(1).optional(),
});

export type TokenConfigInput = z.input<typeof TokenConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function readKeyFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new Error(`Unable to read key file ${filePath}`, { cause: error });
  }
}

/**
 * Load a JSON config file of the `fromObject` shape.
 *
 * `private_key_file` / `public_key_file` may stand in for the inline keys;
 * they resolve relative to the config file's directory.
 */
export function loadConfigFile(filePath: string): TokenConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new Error(`Unable to read config file ${filePath}`, { cause: error });
  }

  if (!isClaimSet(raw)) {
    throw new Error(`Config file ${filePath} must contain a JSON object`);
  }

  const refs = KeyFileRefsSchema.safeParse(raw);
  if (!refs.success) {
    throw new Error(`Invalid token config: ${formatIssues(refs.error)}`);
  }

  const baseDir = path.dirname(path.resolve(filePath));
  const resolved: Record<string, unknown> = { ...raw };
  if (refs.data.private_key_file) {
    resolved.private_key = readKeyFile(path.resolve(baseDir, refs.data.private_key_file));
  }
  if (refs.data.public_key_file) {
    resolved.public_key = readKeyFile(path.resolve(baseDir, refs.data.public_key_file));
  }

  return TokenConfig.fromObject(resolved);
}
