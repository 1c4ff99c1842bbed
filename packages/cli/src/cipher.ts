import * as crypto from 'node:crypto';
import { DecryptionError, EncryptionError } from './errors.js';

// -- Constants ---

const CIPHER_ALGORITHM = 'aes-256-cbc'; // PKCS#7 padding is the Node default

// -- Public API ---

/**
 * Encrypt a whole payload with AES-256-CBC. The payload is held in memory.
 *
 * @param key - 32-byte derived key
 * @param iv - 16-byte initialization vector
 * @throws EncryptionError if the cipher rejects its inputs
 */
export function encryptPayload(key: Uint8Array, iv: Uint8Array, plaintext: Uint8Array): Buffer {
  try {
    const cipher = crypto.createCipheriv(CIPHER_ALGORITHM, key, iv);
    return Buffer.concat([cipher.update(plaintext), cipher.final()]);
  } catch (cause) {
    throw new EncryptionError('Failed to encrypt data', cause);
  }
}

/**
 * Decrypt an AES-256-CBC payload and strip its padding.
 *
 * Every failure, whatever the underlying reason, surfaces as the same
 * DecryptionError with no cause attached.
 *
 * @throws DecryptionError on wrong key, bad padding or truncated input
 */
export function decryptPayload(key: Uint8Array, iv: Uint8Array, ciphertext: Uint8Array): Buffer {
  try {
    const decipher = crypto.createDecipheriv(CIPHER_ALGORITHM, key, iv);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch {
    throw new DecryptionError();
  }
}
