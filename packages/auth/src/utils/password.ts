/**
 * Password Hashing Utilities
 * PBKDF2-HMAC-SHA-256 through Web Crypto. The stored string carries its own
 * algorithm, cost and salt:
 *
 *   pbkdf2-sha256$<iterations>$<salt base64url>$<key base64url>
 */

import { webcrypto } from 'node:crypto';
import { PasswordHashError } from '../errors.js';
import { base64UrlDecode, base64UrlEncode, randomBytes, timingSafeEqualBytes } from './crypto.js';

const ALGORITHM_ID = 'pbkdf2-sha256';
const SALT_LENGTH = 16;
const KEY_LENGTH = 32;

/** Default PBKDF2 cost */
export const DEFAULT_PBKDF2_ITERATIONS = 100000;

export interface HashPasswordOptions {
  /** PBKDF2 iteration count (default: 100000) */
  iterations?: number;
}

async function deriveKey(
  password: string,
  salt: Uint8Array,
  iterations: number,
  keyLength: number
): Promise<Uint8Array> {
  const passwordKey = await webcrypto.subtle.importKey(
    'raw',
    new TextEncoder().encode(password),
    'PBKDF2',
    false,
    ['deriveBits']
  );

  const derivedBits = await webcrypto.subtle.deriveBits(
    {
      name: 'PBKDF2',
      salt,
      iterations,
      hash: 'SHA-256',
    },
    passwordKey,
    keyLength * 8
  );

  return new Uint8Array(derivedBits);
}

/**
 * Hash a password using PBKDF2 with a fresh random salt
 */
export async function hashPassword(
  password: string,
  options: HashPasswordOptions = {}
): Promise<string> {
  const iterations = options.iterations ?? DEFAULT_PBKDF2_ITERATIONS;
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new RangeError(`PBKDF2 iterations must be a positive integer, got ${iterations}`);
  }

  const salt = randomBytes(SALT_LENGTH);
  const key = await deriveKey(password, salt, iterations, KEY_LENGTH);

  return [ALGORITHM_ID, String(iterations), base64UrlEncode(salt), base64UrlEncode(key)].join('$');
}

interface ParsedHash {
  iterations: number;
  salt: Uint8Array;
  key: Uint8Array;
}

function parseHash(storedHash: string): ParsedHash {
  const parts = storedHash.split('$');
  if (parts.length !== 4) {
    throw new PasswordHashError('Stored password hash has an unknown format');
  }

  const [algorithm, cost, encodedSalt, encodedKey] = parts;
  if (algorithm !== ALGORITHM_ID) {
    throw new PasswordHashError(`Unsupported password hash algorithm "${algorithm}"`);
  }

  const iterations = Number(cost);
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new PasswordHashError('Stored password hash has an invalid iteration count');
  }

  const salt = encodedSalt ? base64UrlDecode(encodedSalt) : null;
  const key = encodedKey ? base64UrlDecode(encodedKey) : null;
  if (!salt || salt.length === 0 || !key || key.length === 0) {
    throw new PasswordHashError('Stored password hash has an undecodable salt or key');
  }

  return { iterations, salt, key };
}

/**
 * Verify a password against a stored hash.
 * Resolves false on mismatch; rejects with PasswordHashError when the stored hash is malformed.
 */
export async function verifyPassword(
  password: string,
  storedHash: string
): Promise<boolean> {
  const { iterations, salt, key } = parseHash(storedHash);
  const derived = await deriveKey(password, salt, iterations, key.length);
  return timingSafeEqualBytes(derived, key);
}
