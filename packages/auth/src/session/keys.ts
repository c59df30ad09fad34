/**
 * RSA signing keys
 * Loads the PEM pair once at startup and checks that it belongs together
 */

import { readFile } from 'node:fs/promises';
import { createPrivateKey, createPublicKey, type KeyObject } from 'node:crypto';
import { KeyLoadError } from '../errors.js';

/** Smallest modulus accepted for RS256 */
export const MIN_RSA_MODULUS_BITS = 2048;

/**
 * A matched RSA key pair
 */
export interface RsaKeyPair {
  privateKey: KeyObject;
  publicKey: KeyObject;
}

/**
 * Key file locations
 */
export interface RsaKeyPaths {
  privateKeyPath: string;
  publicKeyPath: string;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function assertRsa(key: KeyObject, label: string): void {
  if (key.asymmetricKeyType !== 'rsa') {
    throw new KeyLoadError(`${label} key is ${key.asymmetricKeyType ?? 'not asymmetric'}, expected rsa`);
  }
  const bits = key.asymmetricKeyDetails?.modulusLength ?? 0;
  if (bits < MIN_RSA_MODULUS_BITS) {
    throw new KeyLoadError(`${label} key modulus is ${bits} bits, at least ${MIN_RSA_MODULUS_BITS} required`);
  }
}

function modulusOf(key: KeyObject): string | undefined {
  const jwk = key.export({ format: 'jwk' });
  return jwk.n !== undefined && jwk.e !== undefined ? `${jwk.n}.${jwk.e}` : undefined;
}

/**
 * Parse a PEM key pair.
 * Private keys may be PKCS#1 ("RSA PRIVATE KEY") or PKCS#8 ("PRIVATE KEY");
 * public keys may be SPKI ("PUBLIC KEY") or PKCS#1 ("RSA PUBLIC KEY").
 */
export function importRsaKeyPair(privatePem: string, publicPem: string): RsaKeyPair {
  let privateKey: KeyObject;
  try {
    privateKey = createPrivateKey({ key: privatePem, format: 'pem' });
  } catch (error) {
    throw new KeyLoadError(`Failed to parse private key: ${messageOf(error)}`, { cause: error });
  }

  if (publicPem.includes('PRIVATE KEY')) {
    throw new KeyLoadError('Public key file contains a private key');
  }

  let publicKey: KeyObject;
  try {
    publicKey = createPublicKey({ key: publicPem, format: 'pem' });
  } catch (error) {
    throw new KeyLoadError(`Failed to parse public key: ${messageOf(error)}`, { cause: error });
  }

  assertRsa(privateKey, 'Private');
  assertRsa(publicKey, 'Public');

  if (modulusOf(createPublicKey(privateKey)) !== modulusOf(publicKey)) {
    throw new KeyLoadError('Public key does not match private key');
  }

  return { privateKey, publicKey };
}

/**
 * Read and parse the key pair from disk
 */
export async function loadRsaKeyPair(paths: RsaKeyPaths): Promise<RsaKeyPair> {
  const read = async (path: string, label: string): Promise<string> => {
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      throw new KeyLoadError(`Failed to read ${label} key from ${path}: ${messageOf(error)}`, { cause: error });
    }
  };

  const [privatePem, publicPem] = await Promise.all([
    read(paths.privateKeyPath, 'private'),
    read(paths.publicKeyPath, 'public'),
  ]);

  return importRsaKeyPair(privatePem, publicPem);
}
