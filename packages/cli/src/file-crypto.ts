import * as crypto from 'node:crypto';
import { deriveKey, SALT_LENGTH } from './key-derivation.js';
import { encodeEnvelope, decodeEnvelope, IV_LENGTH } from './envelope.js';
import { encryptPayload, decryptPayload } from './cipher.js';
import { wipeBuffer } from './key-wipe.js';
import type { Passphrase } from './passphrase.js';

// -- Types ---

/**
 * Source of cryptographically secure random bytes for salt and IV.
 */
export type RandomSource = (size: number) => Uint8Array;

// -- Constants ---

const defaultRandom: RandomSource = (size) => crypto.randomBytes(size);

// -- Public API ---

/**
 * Encrypt a payload into an envelope (salt ‖ iv ‖ ciphertext).
 * Salt and IV are drawn fresh for every call; the derived key is wiped before returning.
 */
export async function sealBytes(
  plaintext: Uint8Array,
  passphrase: Passphrase,
  random: RandomSource = defaultRandom,
): Promise<Buffer> {
  const salt = random(SALT_LENGTH);
  const iv = random(IV_LENGTH);

  const key = await passphrase.use((bytes) => deriveKey(bytes, salt));
  try {
    const ciphertext = encryptPayload(key, iv, plaintext);
    return encodeEnvelope({ salt, iv, ciphertext });
  } finally {
    wipeBuffer(key);
  }
}

/**
 * Decrypt an envelope produced by sealBytes (or the OpenSSL-compatible shell bridge).
 *
 * @throws MalformedEnvelopeError if the stream is too short, before any key derivation
 * @throws DecryptionError on wrong passphrase or corrupted ciphertext
 */
export async function openBytes(envelopeBytes: Uint8Array, passphrase: Passphrase): Promise<Buffer> {
  const { salt, iv, ciphertext } = decodeEnvelope(envelopeBytes);

  const key = await passphrase.use((bytes) => deriveKey(bytes, salt));
  try {
    return decryptPayload(key, iv, ciphertext);
  } finally {
    wipeBuffer(key);
  }
}
