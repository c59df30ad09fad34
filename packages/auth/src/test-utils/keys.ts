/**
 * Test signing keys. Generated once per test file; 2048 bits is the smallest size accepted.
 */

import { generateKeyPairSync } from 'node:crypto';
import { importRsaKeyPair, type RsaKeyPair } from '../session/keys.js';

export interface TestPemPair {
  privatePem: string;
  publicPem: string;
}

function generatePemPair(format: 'pkcs8' | 'pkcs1'): TestPemPair {
  const { privateKey, publicKey } = generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: format === 'pkcs8' ? 'spki' : 'pkcs1', format: 'pem' },
    privateKeyEncoding: { type: format, format: 'pem' },
  });
  return { privatePem: privateKey, publicPem: publicKey };
}

let primary: TestPemPair | undefined;
let other: TestPemPair | undefined;

/** PKCS#8 private key with an SPKI public key */
export function testPemPair(): TestPemPair {
  primary ??= generatePemPair('pkcs8');
  return primary;
}

/** A second, unrelated pair */
export function otherPemPair(): TestPemPair {
  other ??= generatePemPair('pkcs1');
  return other;
}

export function testKeyPair(): RsaKeyPair {
  const { privatePem, publicPem } = testPemPair();
  return importRsaKeyPair(privatePem, publicPem);
}

export function otherKeyPair(): RsaKeyPair {
  const { privatePem, publicPem } = otherPemPair();
  return importRsaKeyPair(privatePem, publicPem);
}

/** A 1024-bit PKCS#8 pair, too small to load */
export function weakPemPair(): TestPemPair {
  const { privateKey, publicKey } = generateKeyPairSync('rsa', {
    modulusLength: 1024,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
  });
  return { privatePem: privateKey, publicPem: publicKey };
}
