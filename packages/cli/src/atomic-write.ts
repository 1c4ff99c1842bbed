import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { OutputExistsError } from './errors.js';

// -- Constants ---

export const TEMP_FILE_SUFFIX = '.pathguard-tmp';

// -- Public API ---

export interface AtomicWriteOptions {
  /** Replace an existing target. Without it, a target that appeared meanwhile is left alone. */
  readonly overwrite: boolean;
  readonly mode?: number;
  /** Checked after the temp file is written; an aborted write never reaches the target. */
  readonly signal?: AbortSignal;
}

/**
 * Write `data` to a sibling temp file, then rename it over `target`.
 * Readers of `target` never observe a partially written file, and the temp
 * file is removed on every failure path.
 *
 * @throws OutputExistsError if the target exists and overwrite is false
 */
export async function writeFileAtomic(
  target: string,
  data: Uint8Array,
  options: AtomicWriteOptions,
): Promise<void> {
  const tempPath = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${crypto.randomBytes(6).toString('hex')}${TEMP_FILE_SUFFIX}`,
  );

  try {
    await fs.promises.writeFile(tempPath, data, { flag: 'wx', mode: options.mode ?? 0o600 });
    options.signal?.throwIfAborted();
    if (!options.overwrite && fs.existsSync(target)) {
      throw new OutputExistsError(target);
    }
    await fs.promises.rename(tempPath, target);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}
