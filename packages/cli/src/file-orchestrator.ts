import * as fs from 'node:fs';
import * as path from 'node:path';
import { sealBytes, openBytes } from './file-crypto.js';
import type { RandomSource } from './file-crypto.js';
import type { Passphrase } from './passphrase.js';
import { discoverFiles } from './file-walker.js';
import type { DiscoveredFile } from './file-walker.js';
import { writeFileAtomic } from './atomic-write.js';
import { OutputExistsError, toFileErrorKind } from './errors.js';
import type { FileErrorKind } from './errors.js';
import { wipeBuffer } from './key-wipe.js';
import { log, warn } from './logger.js';

// -- Types ---

export type Operation = 'protect' | 'unprotect';

export type FileStatus = 'success' | 'dry-run' | 'skipped' | 'failed';

export interface FileError {
  readonly kind: FileErrorKind | 'cancelled';
  readonly message: string;
}

/**
 * Outcome for one input file. Created once, never mutated.
 */
export interface FileResult {
  readonly inputPath: string;
  readonly outputPath: string | null;
  readonly status: FileStatus;
  readonly success: boolean;
  readonly sourceRemoved: boolean;
  readonly error: FileError | null;
}

export interface BatchSummary {
  readonly total: number;
  readonly succeeded: number;
  readonly skipped: number;
  readonly failed: number;
}

export interface BatchReport {
  /** False when at least one file failed. Skips do not count as failures. */
  readonly ok: boolean;
  readonly results: readonly FileResult[];
  readonly summary: BatchSummary;
}

interface CommonOptions {
  /** Output file, or directory when several files are processed or it already is one. */
  readonly outputPath?: string;
  readonly recurse?: boolean;
  readonly force?: boolean;
  readonly dryRun?: boolean;
  readonly include?: readonly string[];
  readonly exclude?: readonly string[];
  /** Stops the batch between files; an in-flight write is discarded. */
  readonly signal?: AbortSignal;
}

export interface ProtectOptions extends CommonOptions {
  readonly removeOriginal?: boolean;
  readonly random?: RandomSource;
}

export interface UnprotectOptions extends CommonOptions {
  readonly keepEncrypted?: boolean;
}

interface BatchPlan {
  readonly operation: Operation;
  readonly transform: (input: Uint8Array) => Promise<Buffer>;
  readonly removeSource: boolean;
  readonly options: CommonOptions;
}

// -- Constants ---

const ENCRYPTED_EXTENSION = '.enc';
const DECRYPTED_EXTENSION = '.dec';

// -- Public API ---

/**
 * Encrypt every file under `inputs` with the passphrase.
 * Each file gets a fresh salt and IV and its own derived key.
 */
export async function protectPaths(
  inputs: readonly string[],
  passphrase: Passphrase,
  options: ProtectOptions = {},
): Promise<BatchReport> {
  return runBatch(inputs, {
    operation: 'protect',
    transform: (input) => sealBytes(input, passphrase, options.random),
    removeSource: options.removeOriginal ?? false,
    options,
  });
}

/**
 * Decrypt every `.enc` file under `inputs` (explicit file inputs are taken as-is).
 * The encrypted source is removed after a successful decrypt unless keepEncrypted is set.
 */
export async function unprotectPaths(
  inputs: readonly string[],
  passphrase: Passphrase,
  options: UnprotectOptions = {},
): Promise<BatchReport> {
  return runBatch(inputs, {
    operation: 'unprotect',
    transform: (input) => openBytes(input, passphrase),
    removeSource: !(options.keepEncrypted ?? false),
    options,
  });
}

/**
 * Compute where a file's output goes when no explicit output path is given.
 */
export function defaultOutputPath(operation: Operation, inputPath: string): string {
  return path.join(path.dirname(inputPath), defaultOutputName(operation, path.basename(inputPath)));
}

// -- Internal Helpers ---

function defaultOutputName(operation: Operation, fileName: string): string {
  if (operation === 'protect') {
    return fileName + ENCRYPTED_EXTENSION;
  }
  const stripped = fileName.slice(0, -ENCRYPTED_EXTENSION.length);
  if (hasEncryptedExtension(fileName) && stripped.length > 0) {
    return stripped;
  }
  return fileName + DECRYPTED_EXTENSION;
}

function hasEncryptedExtension(fileName: string): boolean {
  return fileName.toLowerCase().endsWith(ENCRYPTED_EXTENSION);
}

async function runBatch(inputs: readonly string[], plan: BatchPlan): Promise<BatchReport> {
  const { operation, options } = plan;
  const entries = discoverFiles(inputs, {
    recurse: options.recurse ?? false,
    include: options.include ?? [],
    exclude: options.exclude ?? [],
    accept: operation === 'protect'
      ? (name) => !hasEncryptedExtension(name)
      : hasEncryptedExtension,
  });

  const intoDirectory = options.outputPath !== undefined && outputIsDirectory(
    options.outputPath,
    entries.length > 1 || entries.some((entry) => entry.ok && entry.file.fromDirectory),
  );

  // Resolved output path -> the input that claimed it first in this batch.
  const claimedOutputs = new Map<string, string>();

  const results: FileResult[] = [];
  for (const entry of entries) {
    if (!entry.ok) {
      warn(entry.error.message);
      results.push(failure(entry.path, null, { kind: toFileErrorKind(entry.error), message: entry.error.message }));
      continue;
    }

    const outputPath = resolveOutputPath(operation, entry.file, options.outputPath, intoDirectory);

    if (options.signal?.aborted) {
      results.push(failure(entry.file.path, outputPath, { kind: 'cancelled', message: 'Cancelled before processing' }));
      continue;
    }

    const claimedBy = claimedOutputs.get(path.resolve(outputPath));
    if (claimedBy !== undefined) {
      const message = `Output '${outputPath}' collides with the output of '${claimedBy}'`;
      warn(message);
      results.push(failure(entry.file.path, outputPath, { kind: 'io_failure', message }));
      continue;
    }
    claimedOutputs.set(path.resolve(outputPath), entry.file.path);

    results.push(await processFile(entry.file, outputPath, plan));
  }

  const summary = summarize(results);
  log(
    `${operation === 'protect' ? 'Encrypt' : 'Decrypt'}: ${summary.succeeded} succeeded, ` +
    `${summary.skipped} skipped, ${summary.failed} failed`,
  );

  return { ok: summary.failed === 0, results, summary };
}

async function processFile(file: DiscoveredFile, outputPath: string, plan: BatchPlan): Promise<FileResult> {
  const { options } = plan;
  const force = options.force ?? false;

  if (path.resolve(outputPath) === path.resolve(file.path)) {
    const message = `Output path is the same as the input: ${file.path}`;
    warn(message);
    return failure(file.path, outputPath, { kind: 'io_failure', message });
  }

  if (!force && fs.existsSync(outputPath)) {
    return skipped(file.path, outputPath);
  }

  const verb = plan.operation === 'protect' ? 'encrypt' : 'decrypt';

  if (options.dryRun) {
    log(`Would ${verb} '${file.path}' -> '${outputPath}'${plan.removeSource ? ' and remove the source' : ''}`);
    return {
      inputPath: file.path,
      outputPath,
      status: 'dry-run',
      success: true,
      sourceRemoved: false,
      error: null,
    };
  }

  let input: Buffer | undefined;
  let output: Buffer | undefined;
  try {
    input = await fs.promises.readFile(file.path);
    output = await plan.transform(input);
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await writeFileAtomic(outputPath, output, { overwrite: force, signal: options.signal });
  } catch (error: unknown) {
    if (error instanceof OutputExistsError) {
      return skipped(file.path, outputPath);
    }
    const message = error instanceof Error ? error.message : String(error);
    const kind = options.signal?.aborted ? 'cancelled' : toFileErrorKind(error);
    warn(`Failed to ${verb} '${file.path}': ${message}`);
    return failure(file.path, outputPath, { kind, message });
  } finally {
    // Plaintext is on the input side for protect and the output side for unprotect.
    if (input) {
      wipeBuffer(input);
    }
    if (output) {
      wipeBuffer(output);
    }
  }

  if (plan.removeSource) {
    try {
      await fs.promises.unlink(file.path);
    } catch (error: unknown) {
      const message = `Wrote '${outputPath}' but could not remove '${file.path}': ${
        error instanceof Error ? error.message : String(error)
      }`;
      warn(message);
      return failure(file.path, outputPath, { kind: 'io_failure', message });
    }
  }

  log(`${plan.operation === 'protect' ? 'Encrypted' : 'Decrypted'} '${file.path}' -> '${outputPath}'`);
  return {
    inputPath: file.path,
    outputPath,
    status: 'success',
    success: true,
    sourceRemoved: plan.removeSource,
    error: null,
  };
}

function outputIsDirectory(outputPath: string, multipleFiles: boolean): boolean {
  if (multipleFiles || outputPath.endsWith('/') || outputPath.endsWith(path.sep)) {
    return true;
  }
  try {
    return fs.statSync(outputPath).isDirectory();
  } catch {
    return false;
  }
}

function resolveOutputPath(
  operation: Operation,
  file: DiscoveredFile,
  outputPath: string | undefined,
  intoDirectory: boolean,
): string {
  if (outputPath === undefined) {
    return defaultOutputPath(operation, file.path);
  }
  if (!intoDirectory) {
    return path.resolve(outputPath);
  }
  const name = defaultOutputName(operation, path.basename(file.relativePath));
  return path.resolve(outputPath, path.dirname(file.relativePath), name);
}

function skipped(inputPath: string, outputPath: string): FileResult {
  const message = new OutputExistsError(outputPath).message;
  warn(message);
  return {
    inputPath,
    outputPath,
    status: 'skipped',
    success: false,
    sourceRemoved: false,
    error: { kind: 'output_exists', message },
  };
}

function failure(inputPath: string, outputPath: string | null, error: FileError): FileResult {
  return {
    inputPath,
    outputPath,
    status: 'failed',
    success: false,
    sourceRemoved: false,
    error,
  };
}

function summarize(results: readonly FileResult[]): BatchSummary {
  return {
    total: results.length,
    succeeded: results.filter((r) => r.status === 'success' || r.status === 'dry-run').length,
    skipped: results.filter((r) => r.status === 'skipped').length,
    failed: results.filter((r) => r.status === 'failed').length,
  };
}
