/**
 * jwt-session-kit CLI - command definitions
 *
 * Commands:
 * - jwtkit keygen: Generate a secret or key pair
 * - jwtkit encode: Issue a token from a config file
 * - jwtkit decode: Fully verify a token against a config file
 * - jwtkit inspect: Show token contents without verification
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';

import {
  Algorithm,
  ClaimSet,
  DecodedToken,
  TokenManager,
  VERSION,
  decodeToken,
  generateKeyPair,
  isClaimSet,
  isSymmetric,
  isTokenError,
  loadConfigFile,
  parseAlgorithm,
  DEFAULT_RSA_MODULUS_LENGTH,
} from '../index';

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Print styled output
 */
const print = {
  success: (msg: string) => console.log(chalk.green('✓'), msg),
  error: (msg: string) => console.error(chalk.red('✗'), msg),
  header: (msg: string) => console.log(chalk.bold.cyan('\n' + msg)),
  json: (obj: unknown) => console.log(JSON.stringify(obj, null, 2)),
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function fail(msg: string): void {
  print.error(msg);
  process.exitCode = 1;
}

/**
 * Format epoch seconds as ISO-8601
 */
export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString();
}

/**
 * Human-readable distance between `exp` and `now`
 */
export function getTimeRemaining(exp: number, now: number = Math.floor(Date.now() / 1000)): string {
  const diff = exp - now;

  if (diff < 0) {
    const absDiff = Math.abs(diff);
    if (absDiff < 60) return `${absDiff}s ago`;
    if (absDiff < 3600) return `${Math.floor(absDiff / 60)}m ago`;
    if (absDiff < 86400) return `${Math.floor(absDiff / 3600)}h ago`;
    return `${Math.floor(absDiff / 86400)}d ago`;
  }

  if (diff < 60) return `${diff}s`;
  if (diff < 3600) return `${Math.floor(diff / 60)}m ${diff % 60}s`;
  if (diff < 86400) return `${Math.floor(diff / 3600)}h ${Math.floor((diff % 3600) / 60)}m`;
  return `${Math.floor(diff / 86400)}d ${Math.floor((diff % 86400) / 3600)}h`;
}

/**
 * Parse the `--claims` option into a claim set
 */
export function parseClaims(raw: string | undefined): ClaimSet {
  if (raw === undefined) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`--claims is not valid JSON: ${errorMessage(err)}`);
  }
  if (!isClaimSet(parsed)) {
    throw new Error('--claims must be a JSON object');
  }
  return parsed;
}

function writeOutput(content: string, filePath: string): void {
  fs.writeFileSync(filePath, content.endsWith('\n') ? content : content + '\n');
  print.success(`Written to ${filePath}`);
}

// ============================================================================
// COMMANDS
// ============================================================================

interface KeygenOptions {
  algorithm: string;
  bits?: string;
  output?: string;
  publicOut?: string;
}

/**
 * keygen command - Generate a shared secret or key pair
 */
async function keygenCommand(options: KeygenOptions): Promise<void> {
  let algorithm: Algorithm;
  try {
    algorithm = parseAlgorithm(options.algorithm);
  } catch (err) {
    fail(errorMessage(err));
    return;
  }

  const modulusLength = options.bits ? parseInt(options.bits, 10) : DEFAULT_RSA_MODULUS_LENGTH;
  if (!Number.isInteger(modulusLength) || modulusLength < 1024) {
    fail(`Invalid RSA key size: ${options.bits}`);
    return;
  }

  try {
    const keys = await generateKeyPair(algorithm, modulusLength);

    if (isSymmetric(algorithm)) {
      if (options.output) {
        writeOutput(keys.privateKey, options.output);
      } else {
        console.log(keys.privateKey);
      }
      return;
    }

    if (options.output) {
      writeOutput(keys.privateKey, options.output);
      const pubPath = options.publicOut || options.output.replace(/\.pem$/, '') + '.pub.pem';
      writeOutput(keys.publicKey, pubPath);
    } else {
      console.log(keys.privateKey.trimEnd());
      console.log(keys.publicKey.trimEnd());
    }
  } catch (err) {
    fail(`Failed to generate keys: ${errorMessage(err)}`);
  }
}

interface EncodeOptions {
  config: string;
  claims?: string;
  refresh?: boolean;
}

/**
 * encode command - Issue a signed token
 */
function encodeCommand(subject: string, options: EncodeOptions): void {
  try {
    const manager = new TokenManager(loadConfigFile(options.config));
    const issued = manager.issue(subject, parseClaims(options.claims));

    console.log(issued.token);
    if (options.refresh) {
      console.log(manager.generateRefreshToken());
    }
  } catch (err) {
    fail(isTokenError(err) ? `${err.errorKey}: ${err.message}` : errorMessage(err));
  }
}

interface DecodeOptions {
  config: string;
}

/**
 * decode command - Verify a token and print its claims
 */
function decodeCommand(token: string, options: DecodeOptions): void {
  let manager: TokenManager;
  try {
    manager = new TokenManager(loadConfigFile(options.config));
  } catch (err) {
    fail(errorMessage(err));
    return;
  }

  const result = manager.verify(token.trim());
  if (!result.valid) {
    fail(`${result.error.errorKey}: ${result.error.message}`);
    return;
  }

  print.json(result.payload.toObject());
}

interface InspectOptions {
  json?: boolean;
}

/**
 * inspect command - Decode and display token contents without verification
 */
function inspectCommand(token: string, options: InspectOptions): void {
  let decoded: DecodedToken;
  try {
    decoded = decodeToken(token.trim());
  } catch (err) {
    fail(errorMessage(err));
    return;
  }

  const { header, payload } = decoded;

  if (options.json) {
    print.json({ header, payload });
    return;
  }

  print.header('Token Details');

  console.log(chalk.bold('\nHeader:'));
  console.log(`  ${chalk.dim('Algorithm:')}   ${chalk.cyan(String(header.alg))}`);
  console.log(`  ${chalk.dim('Type:')}        ${chalk.cyan(String(header.typ))}`);

  console.log(chalk.bold('\nPayload:'));
  for (const [name, value] of Object.entries(payload)) {
    console.log(`  ${chalk.dim(name + ':')} ${JSON.stringify(value)}`);
  }

  const { iat, exp } = payload;
  if (typeof iat === 'number' && typeof exp === 'number') {
    const now = Math.floor(Date.now() / 1000);
    const expired = now > exp;
    const expColor = expired ? chalk.red : chalk.green;
    console.log(chalk.bold('\nTimestamps:'));
    console.log(`  ${chalk.dim('Issued At:')}   ${formatTimestamp(iat)} ${chalk.dim('(iat)')}`);
    console.log(`  ${chalk.dim('Expires At:')}  ${expColor(formatTimestamp(exp))} ${chalk.dim('(exp)')}`);
    console.log(`  ${chalk.dim('Status:')}      ${expired ? chalk.red('EXPIRED') : chalk.green('VALID')} (${getTimeRemaining(exp, now)})`);
  }
}

// ============================================================================
// CLI PROGRAM
// ============================================================================

export function createProgram(): Command {
  const program = new Command();

  program
    .name('jwtkit')
    .description(chalk.cyan('Issue and verify signed session tokens'))
    .version(VERSION, '-v, --version')
    .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.dim('# Generate an ES256 key pair')}
  $ jwtkit keygen -a ES256 -o keys/signing-key.pem

  ${chalk.dim('# Issue a token with extra claims')}
  $ jwtkit encode user-123 -c token.config.json --claims '{"role":"admin"}'

  ${chalk.dim('# Verify a token')}
  $ jwtkit decode <token> -c token.config.json

  ${chalk.dim('# Inspect a token without verifying it')}
  $ jwtkit inspect <token>
`);

  program
    .command('keygen')
    .description('Generate a shared secret (HS*) or a key pair')
    .option('-a, --algorithm <alg>', `Algorithm (${Object.values(Algorithm).join(', ')})`, Algorithm.RS256)
    .option('-b, --bits <bits>', `RSA key size in bits (default: ${DEFAULT_RSA_MODULUS_LENGTH})`)
    .option('-o, --output <file>', 'Output file for the private key or secret')
    .option('-p, --public-out <file>', 'Output file for the public key')
    .action(keygenCommand);

  program
    .command('encode <subject>')
    .description('Issue a signed token for a subject')
    .requiredOption('-c, --config <file>', 'Token config file (JSON)')
    .option('--claims <json>', 'Custom claims as a JSON object')
    .option('-r, --refresh', 'Also print a refresh token')
    .action(encodeCommand);

  program
    .command('decode <token>')
    .description('Verify a token and print its claims')
    .requiredOption('-c, --config <file>', 'Token config file (JSON)')
    .action(decodeCommand);

  program
    .command('inspect <token>')
    .description('Show token contents without verifying the signature')
    .option('-j, --json', 'Output as JSON')
    .action(inspectCommand);

  return program;
}
