// -- Types ---

/**
 * Per-file failure categories reported in batch results.
 */
export type FileErrorKind =
  | 'path_not_found'
  | 'output_exists'
  | 'malformed_envelope'
  | 'decryption_failed'
  | 'io_failure';

// -- Error Types ---

/**
 * Thrown when key derivation is called with invalid parameters
 * (wrong salt length, empty passphrase, non-positive iteration count).
 */
export class DeriveKeyError extends Error {
  override readonly name = 'DeriveKeyError' as const;

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
  }
}

/**
 * Thrown when encryption of a payload fails.
 */
export class EncryptionError extends Error {
  override readonly name = 'EncryptionError' as const;

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
  }
}

/**
 * Thrown when an envelope is structurally invalid (too short, wrong field sizes).
 * Raised before any cryptographic work is attempted.
 */
export class MalformedEnvelopeError extends Error {
  override readonly name = 'MalformedEnvelopeError' as const;

  constructor(message: string) {
    super(message);
  }
}

/**
 * Thrown when decryption fails for any reason (wrong passphrase, corrupted or truncated ciphertext).
 * Never carries a cause, so padding details stay out of results and logs.
 */
export class DecryptionError extends Error {
  override readonly name = 'DecryptionError' as const;

  constructor() {
    super('Decryption failed: invalid password or corrupted file');
  }
}

/**
 * Thrown when an input path does not exist.
 */
export class PathNotFoundError extends Error {
  override readonly name = 'PathNotFoundError' as const;

  constructor(readonly path: string) {
    super(`Path not found: ${path}`);
  }
}

/**
 * Raised when a directory found during a walk cannot be listed (permissions, I/O).
 */
export class DirectoryReadError extends Error {
  override readonly name = 'DirectoryReadError' as const;

  constructor(
    readonly path: string,
    override readonly cause?: unknown,
  ) {
    super(`Cannot read directory: ${path}${cause instanceof Error ? ` (${cause.message})` : ''}`);
  }
}

/**
 * Thrown when the computed output path already exists and force is not set.
 */
export class OutputExistsError extends Error {
  override readonly name = 'OutputExistsError' as const;

  constructor(readonly path: string) {
    super(`Output already exists: ${path} (use --force to overwrite)`);
  }
}

/**
 * Thrown when the selected character classes minus excluded characters leave nothing to draw from.
 */
export class AllCharactersExcludedError extends Error {
  override readonly name = 'AllCharactersExcludedError' as const;

  constructor() {
    super('All characters have been excluded; nothing left to generate from');
  }
}

/**
 * Thrown when ~/.pathguard/config.json cannot be parsed or fails validation.
 */
export class ConfigError extends Error {
  override readonly name = 'ConfigError' as const;

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
  }
}

/**
 * Thrown when no passphrase can be obtained (no flag, no env var, no TTY).
 */
export class NoPasswordError extends Error {
  override readonly name = 'NoPasswordError' as const;

  constructor() {
    super('No password provided. Pass --password, set PATHGUARD_PASSWORD, or run in an interactive terminal');
  }
}

// -- Public API ---

/**
 * Map a thrown error to the per-file error kind reported in results.
 */
export function toFileErrorKind(error: unknown): FileErrorKind {
  if (error instanceof PathNotFoundError) {
    return 'path_not_found';
  }
  if (error instanceof OutputExistsError) {
    return 'output_exists';
  }
  if (error instanceof MalformedEnvelopeError) {
    return 'malformed_envelope';
  }
  if (error instanceof DecryptionError) {
    return 'decryption_failed';
  }
  return 'io_failure';
}
