// -- Errors ---

export type { FileErrorKind } from './errors.js';
export {
  DeriveKeyError,
  EncryptionError,
  MalformedEnvelopeError,
  DecryptionError,
  PathNotFoundError,
  DirectoryReadError,
  OutputExistsError,
  AllCharactersExcludedError,
  ConfigError,
  NoPasswordError,
} from './errors.js';

// -- Key Derivation / Envelope / Cipher ---

export { deriveKey, PBKDF2_ITERATIONS, PBKDF2_HASH, KEY_LENGTH, SALT_LENGTH } from './key-derivation.js';
export type { Envelope } from './envelope.js';
export { encodeEnvelope, decodeEnvelope, IV_LENGTH, MIN_ENVELOPE_LENGTH } from './envelope.js';
export { encryptPayload, decryptPayload } from './cipher.js';
export type { RandomSource } from './file-crypto.js';
export { sealBytes, openBytes } from './file-crypto.js';

// -- Secrets ---

export { Passphrase } from './passphrase.js';
export { wipeBuffer, withWiped } from './key-wipe.js';
export { promptForPassword, resolvePassphrase, PromptCancelledError } from './password-prompt.js';
export type { PromptOptions, PromptResult, PassphraseSources } from './password-prompt.js';

// -- File Orchestration ---

export { protectPaths, unprotectPaths, defaultOutputPath } from './file-orchestrator.js';
export type {
  Operation,
  FileStatus,
  FileError,
  FileResult,
  BatchSummary,
  BatchReport,
  ProtectOptions,
  UnprotectOptions,
} from './file-orchestrator.js';

// -- Utilities ---

export { generateRandomString, buildCharacterPool, CHARACTER_CLASSES } from './random-string.js';
export type { RandomStringOptions } from './random-string.js';
export { convertLineEndings, normalizeLineEndings } from './line-endings.js';
export type { LineEnding, ConversionStatus, ConversionResult, ConvertOptions } from './line-endings.js';
