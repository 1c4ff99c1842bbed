import { describe, it, expect } from 'vitest';
import { encodeEnvelope, decodeEnvelope, MIN_ENVELOPE_LENGTH } from './envelope.js';
import { MalformedEnvelopeError } from './errors.js';

describe('envelope', () => {
  const salt = Buffer.alloc(32, 0xAA);
  const iv = Buffer.alloc(16, 0xBB);
  const ciphertext = Buffer.alloc(32, 0xCC);

  describe('encodeEnvelope', () => {
    it('should lay out salt, iv and ciphertext in order', () => {
      const bytes = encodeEnvelope({ salt, iv, ciphertext });

      expect(bytes.length).toBe(80);
      expect(bytes.subarray(0, 32).equals(salt)).toBe(true);
      expect(bytes.subarray(32, 48).equals(iv)).toBe(true);
      expect(bytes.subarray(48).equals(ciphertext)).toBe(true);
    });

    it('should reject a salt of the wrong size', () => {
      expect(() => encodeEnvelope({ salt: Buffer.alloc(8), iv, ciphertext })).toThrow(
        'salt must be 32 bytes, got 8',
      );
    });

    it('should reject an iv of the wrong size', () => {
      expect(() => encodeEnvelope({ salt, iv: Buffer.alloc(12), ciphertext })).toThrow(
        'iv must be 16 bytes, got 12',
      );
    });
  });

  describe('decodeEnvelope', () => {
    it('should split a stream back into its fields', () => {
      const envelope = decodeEnvelope(encodeEnvelope({ salt, iv, ciphertext }));

      expect(Buffer.from(envelope.salt).equals(salt)).toBe(true);
      expect(Buffer.from(envelope.iv).equals(iv)).toBe(true);
      expect(Buffer.from(envelope.ciphertext).equals(ciphertext)).toBe(true);
    });

    it('should accept exactly 64 bytes', () => {
      const envelope = decodeEnvelope(Buffer.alloc(64));

      expect(envelope.ciphertext.length).toBe(16);
    });

    it('should reject 63 bytes with MalformedEnvelopeError', () => {
      expect(MIN_ENVELOPE_LENGTH).toBe(64);
      expect(() => decodeEnvelope(Buffer.alloc(63))).toThrow(MalformedEnvelopeError);
      expect(() => decodeEnvelope(Buffer.alloc(63))).toThrow(
        'File too small to be a valid encrypted file (63 bytes, minimum 64)',
      );
    });

    it('should reject an empty stream', () => {
      expect(() => decodeEnvelope(new Uint8Array(0))).toThrow(MalformedEnvelopeError);
    });
  });
});
