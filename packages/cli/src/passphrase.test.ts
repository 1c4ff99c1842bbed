import { describe, it, expect } from 'vitest';
import { Passphrase } from './passphrase.js';

describe('Passphrase', () => {
  it('should lend the UTF-8 bytes of the passphrase', async () => {
    const passphrase = Passphrase.fromString('correct');

    const text = await passphrase.use(async (bytes) => bytes.toString('utf8'));

    expect(text).toBe('correct');
  });

  it('should zero the lent copy once the callback settles', async () => {
    const passphrase = Passphrase.fromString('correct');
    let lent: Buffer | undefined;

    await passphrase.use(async (bytes) => {
      lent = bytes;
    });

    expect(lent?.length).toBe(7);
    expect(lent?.every(byte => byte === 0)).toBe(true);
  });

  it('should zero the lent copy when the callback throws', async () => {
    const passphrase = Passphrase.fromString('correct');
    let lent: Buffer | undefined;

    await expect(
      passphrase.use(async (bytes) => {
        lent = bytes;
        throw new Error('derivation failed');
      }),
    ).rejects.toThrow('derivation failed');

    expect(lent?.every(byte => byte === 0)).toBe(true);
  });

  it('should refuse to lend after dispose', async () => {
    const passphrase = Passphrase.fromString('correct');

    passphrase.dispose();

    expect(passphrase.isDisposed).toBe(true);
    await expect(passphrase.use(async () => 'never')).rejects.toThrow(
      'Passphrase has already been disposed',
    );
  });

  it('should reject an empty passphrase', () => {
    expect(() => Passphrase.fromString('')).toThrow('password must not be empty');
  });
});
