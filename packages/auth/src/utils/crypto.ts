/**
 * Crypto Utilities
 * Random values and encodings over Node's Web Crypto implementation
 */

import { webcrypto } from 'node:crypto';

/**
 * Alphabet for account identifiers: no 0/O, 1/I/l lookalikes
 */
export const ACCOUNT_ID_ALPHABET = '23456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnpqrstuvwxyz';

/** Account identifier length */
export const ACCOUNT_ID_LENGTH = 16;

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

/**
 * Generate cryptographically secure random bytes
 */
export function randomBytes(byteLength: number): Uint8Array {
  return webcrypto.getRandomValues(new Uint8Array(byteLength));
}

/**
 * Generate cryptographically secure random bytes as hex string
 */
export function generateRandomHex(byteLength = 32): string {
  return bytesToHex(randomBytes(byteLength));
}

/**
 * Generate a random integer between min (inclusive) and max (exclusive)
 * Uses rejection sampling for uniform distribution
 */
export function randomInt(min: number, max: number): number {
  const range = max - min;
  const bytesNeeded = Math.ceil(Math.log2(range) / 8) || 1;
  const maxValid = Math.floor(256 ** bytesNeeded / range) * range;

  let value: number;
  const bytes = new Uint8Array(bytesNeeded);

  do {
    webcrypto.getRandomValues(bytes);
    value = bytes.reduce((acc, byte, i) => acc + byte * 256 ** i, 0);
  } while (value >= maxValid);

  return min + (value % range);
}

/**
 * Generate an account identifier: 16 characters drawn uniformly from ACCOUNT_ID_ALPHABET
 */
export function generateAccountId(): string {
  let id = '';
  for (let i = 0; i < ACCOUNT_ID_LENGTH; i++) {
    id += ACCOUNT_ID_ALPHABET.charAt(randomInt(0, ACCOUNT_ID_ALPHABET.length));
  }
  return id;
}

/**
 * Timing-safe comparison of two Uint8Arrays
 */
export function timingSafeEqualBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }

  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a[i]! ^ b[i]!;
  }

  return result === 0;
}

/**
 * Base64URL encode (URL-safe base64 without padding)
 */
export function base64UrlEncode(data: Uint8Array): string {
  return Buffer.from(data).toString('base64url');
}

/**
 * Base64URL decode. Returns null when the input has characters outside the alphabet.
 */
export function base64UrlDecode(str: string): Uint8Array | null {
  if (!BASE64URL_PATTERN.test(str)) {
    return null;
  }
  return new Uint8Array(Buffer.from(str, 'base64url'));
}

/**
 * Uint8Array to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}
