import { MalformedEnvelopeError } from './errors.js';
import { SALT_LENGTH } from './key-derivation.js';

// -- Types ---

/**
 * Parsed form of an encrypted file: salt ‖ iv ‖ ciphertext.
 */
export interface Envelope {
  readonly salt: Uint8Array; // 32 bytes, key derivation only
  readonly iv: Uint8Array; // 16 bytes, CBC chaining only
  readonly ciphertext: Uint8Array; // AES-256-CBC, PKCS#7 padded
}

// -- Constants ---

export const IV_LENGTH = 16;
export const BLOCK_SIZE = 16;
export const HEADER_LENGTH = SALT_LENGTH + IV_LENGTH;
/** Header plus one padded cipher block. */
export const MIN_ENVELOPE_LENGTH = HEADER_LENGTH + BLOCK_SIZE;

// -- Public API ---

/**
 * Serialize an envelope. Fixed-size fields, no length prefixes, no version tag.
 *
 * @throws MalformedEnvelopeError if salt or iv have the wrong size
 */
export function encodeEnvelope(envelope: Envelope): Buffer {
  if (envelope.salt.length !== SALT_LENGTH) {
    throw new MalformedEnvelopeError(`salt must be ${SALT_LENGTH} bytes, got ${envelope.salt.length}`);
  }
  if (envelope.iv.length !== IV_LENGTH) {
    throw new MalformedEnvelopeError(`iv must be ${IV_LENGTH} bytes, got ${envelope.iv.length}`);
  }
  return Buffer.concat([envelope.salt, envelope.iv, envelope.ciphertext]);
}

/**
 * Split an encrypted byte stream back into its fields.
 * The returned fields are views into `bytes`, not copies.
 *
 * @throws MalformedEnvelopeError if the stream is shorter than 64 bytes
 */
export function decodeEnvelope(bytes: Uint8Array): Envelope {
  if (bytes.length < MIN_ENVELOPE_LENGTH) {
    throw new MalformedEnvelopeError(
      `File too small to be a valid encrypted file (${bytes.length} bytes, minimum ${MIN_ENVELOPE_LENGTH})`,
    );
  }

  return {
    salt: bytes.subarray(0, SALT_LENGTH),
    iv: bytes.subarray(SALT_LENGTH, HEADER_LENGTH),
    ciphertext: bytes.subarray(HEADER_LENGTH),
  };
}
