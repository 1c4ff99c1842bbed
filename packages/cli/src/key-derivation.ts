import * as crypto from 'node:crypto';
import { promisify } from 'node:util';
import { DeriveKeyError } from './errors.js';

// -- Constants ---

export const PBKDF2_ITERATIONS = 100_000;
export const PBKDF2_HASH = 'sha256';
export const KEY_LENGTH = 32; // bytes (AES-256)
export const SALT_LENGTH = 32; // bytes

const pbkdf2 = promisify(crypto.pbkdf2);

// -- Public API ---

/**
 * Derive a 256-bit key with PBKDF2-HMAC-SHA256.
 *
 * Encrypt and decrypt must agree on iterations and hash: a mismatch yields a
 * different key and only shows up later as a padding failure.
 *
 * The caller owns both the passphrase bytes and the returned key and must
 * wipe them once done.
 *
 * @param passphrase - Raw passphrase bytes (UTF-8)
 * @param salt - 32-byte salt from the envelope
 * @throws DeriveKeyError on invalid parameters
 */
export async function deriveKey(
  passphrase: Uint8Array,
  salt: Uint8Array,
  iterations: number = PBKDF2_ITERATIONS,
  hash: string = PBKDF2_HASH,
): Promise<Buffer> {
  if (salt.length !== SALT_LENGTH) {
    throw new DeriveKeyError(`salt must be exactly ${SALT_LENGTH} bytes`);
  }
  if (passphrase.length === 0) {
    throw new DeriveKeyError('password must not be empty');
  }
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new DeriveKeyError('iterations must be a positive integer');
  }

  try {
    return await pbkdf2(passphrase, salt, iterations, KEY_LENGTH, hash);
  } catch (cause) {
    throw new DeriveKeyError('Failed to derive key', cause);
  }
}
