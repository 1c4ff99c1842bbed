/**
 * SECURITY NOTE ON MEMORY WIPE
 *
 * This module provides best-effort wiping of sensitive buffers (derived keys,
 * passphrase bytes). JavaScript runtime limitations mean complete memory
 * clearing is not guaranteed:
 *
 * 1. Garbage Collector may preserve copies
 * 2. CPU caches may retain data
 * 3. Virtual memory/swap may write to disk
 * 4. Strings (the passphrase as typed) are immutable and cannot be cleared
 */

// -- Public API ---

/**
 * Overwrite a buffer with zeros in place.
 *
 * @param buffer - Buffer to wipe (Buffer or Uint8Array)
 */
export function wipeBuffer(buffer: Buffer | Uint8Array): void {
  buffer.fill(0);
}

/**
 * Hand a sensitive buffer to `fn` and zero it once `fn` settles,
 * whether it resolved or threw.
 */
export async function withWiped<T>(
  buffer: Buffer,
  fn: (buffer: Buffer) => Promise<T>,
): Promise<T> {
  try {
    return await fn(buffer);
  } finally {
    wipeBuffer(buffer);
  }
}
