import { DeriveKeyError } from './errors.js';
import { wipeBuffer, withWiped } from './key-wipe.js';

// -- Passphrase ---

/**
 * Holds a passphrase as UTF-8 bytes and only lends them out inside `use()`.
 * Every loan is a fresh copy that is zeroed when the callback settles;
 * `dispose()` zeroes the held bytes.
 */
export class Passphrase {
  private disposed = false;

  private constructor(private readonly bytes: Buffer) {}

  /**
   * @throws DeriveKeyError if the passphrase is empty
   */
  static fromString(value: string): Passphrase {
    if (value.length === 0) {
      throw new DeriveKeyError('password must not be empty');
    }
    return new Passphrase(Buffer.from(value, 'utf8'));
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Run `fn` with a transient copy of the passphrase bytes.
   */
  async use<T>(fn: (bytes: Buffer) => Promise<T>): Promise<T> {
    if (this.disposed) {
      throw new Error('Passphrase has already been disposed');
    }
    const copy = Buffer.alloc(this.bytes.length);
    this.bytes.copy(copy);
    return withWiped(copy, fn);
  }

  dispose(): void {
    wipeBuffer(this.bytes);
    this.disposed = true;
  }
}
