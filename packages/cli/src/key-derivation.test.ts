import { describe, it, expect } from 'vitest';
import * as crypto from 'node:crypto';
import { deriveKey, PBKDF2_ITERATIONS } from './key-derivation.js';

describe('deriveKey', () => {
  const passphrase = Buffer.from('test-password-123', 'utf8');

  it('should derive a 32-byte key', async () => {
    const salt = Buffer.alloc(32, 0x01);

    const key = await deriveKey(passphrase, salt);

    expect(key.length).toBe(32);
  });

  it('should match PBKDF2-HMAC-SHA256 with 100,000 iterations', async () => {
    const salt = Buffer.alloc(32, 0x02);

    const key = await deriveKey(passphrase, salt);
    const expected = crypto.pbkdf2Sync(passphrase, salt, 100_000, 32, 'sha256');

    expect(PBKDF2_ITERATIONS).toBe(100_000);
    expect(key.equals(expected)).toBe(true);
  });

  it('should be deterministic for identical inputs', async () => {
    const salt = Buffer.alloc(32, 0x03);

    const key1 = await deriveKey(passphrase, salt);
    const key2 = await deriveKey(passphrase, salt);

    expect(key1.equals(key2)).toBe(true);
  });

  it('should produce different keys for different salts', async () => {
    const key1 = await deriveKey(passphrase, Buffer.alloc(32, 0x04));
    const key2 = await deriveKey(passphrase, Buffer.alloc(32, 0x05));

    expect(key1.equals(key2)).toBe(false);
  });

  it('should produce a different key when the iteration count differs', async () => {
    const salt = Buffer.alloc(32, 0x06);

    const key1 = await deriveKey(passphrase, salt);
    const key2 = await deriveKey(passphrase, salt, 1000);

    expect(key1.equals(key2)).toBe(false);
  });

  it('should reject invalid salt (not 32 bytes)', async () => {
    await expect(deriveKey(passphrase, new Uint8Array(16))).rejects.toThrow(
      'salt must be exactly 32 bytes',
    );
  });

  it('should reject empty passphrase', async () => {
    await expect(deriveKey(new Uint8Array(0), Buffer.alloc(32))).rejects.toThrow(
      'password must not be empty',
    );
  });

  it('should reject zero iterations', async () => {
    await expect(deriveKey(passphrase, Buffer.alloc(32), 0)).rejects.toThrow(
      'iterations must be a positive integer',
    );
  });
});
