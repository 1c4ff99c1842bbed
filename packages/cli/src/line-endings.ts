import * as fs from 'node:fs';
import { discoverFiles } from './file-walker.js';
import { writeFileAtomic } from './atomic-write.js';
import { log, warn } from './logger.js';

// -- Types ---

export type LineEnding = 'lf' | 'crlf';

export type ConversionStatus = 'converted' | 'dry-run' | 'unchanged' | 'skipped' | 'failed';

export interface ConversionResult {
  readonly path: string;
  readonly status: ConversionStatus;
  readonly message: string | null;
}

export interface ConvertOptions {
  readonly to: LineEnding;
  readonly recurse?: boolean;
  readonly dryRun?: boolean;
  readonly include?: readonly string[];
  readonly exclude?: readonly string[];
}

// -- Constants ---

const EOL: Record<LineEnding, string> = { lf: '\n', crlf: '\r\n' };

// -- Public API ---

/**
 * Rewrite every `\n` and `\r\n` in `text` as the target line ending.
 */
export function normalizeLineEndings(text: string, to: LineEnding): string {
  return text.replace(/\r?\n/g, EOL[to]);
}

/**
 * Convert the line endings of text files in place.
 * Files containing a NUL byte are treated as binary and skipped. Bytes are
 * decoded as latin1 so any encoding without NUL bytes round-trips untouched.
 */
export async function convertLineEndings(
  inputs: readonly string[],
  options: ConvertOptions,
): Promise<ConversionResult[]> {
  const entries = discoverFiles(inputs, {
    recurse: options.recurse ?? false,
    include: options.include ?? [],
    exclude: options.exclude ?? [],
  });

  const results: ConversionResult[] = [];
  for (const entry of entries) {
    if (!entry.ok) {
      warn(entry.error.message);
      results.push({ path: entry.path, status: 'failed', message: entry.error.message });
      continue;
    }
    results.push(await convertFile(entry.file.path, options));
  }

  const converted = results.filter((r) => r.status === 'converted' || r.status === 'dry-run').length;
  const failed = results.filter((r) => r.status === 'failed').length;
  log(`Line endings (${options.to}): ${converted} converted, ${results.length - converted - failed} left as is, ${failed} failed`);

  return results;
}

// -- Internal Helpers ---

async function convertFile(filePath: string, options: ConvertOptions): Promise<ConversionResult> {
  try {
    const bytes = await fs.promises.readFile(filePath);
    if (bytes.includes(0)) {
      return { path: filePath, status: 'skipped', message: 'Binary file' };
    }

    const original = bytes.toString('latin1');
    const converted = normalizeLineEndings(original, options.to);
    if (converted === original) {
      return { path: filePath, status: 'unchanged', message: null };
    }

    if (options.dryRun) {
      log(`Would convert '${filePath}' to ${options.to}`);
      return { path: filePath, status: 'dry-run', message: null };
    }

    const { mode } = await fs.promises.stat(filePath);
    await writeFileAtomic(filePath, Buffer.from(converted, 'latin1'), {
      overwrite: true,
      mode: mode & 0o777,
    });
    return { path: filePath, status: 'converted', message: null };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    warn(`Failed to convert '${filePath}': ${message}`);
    return { path: filePath, status: 'failed', message };
  }
}
