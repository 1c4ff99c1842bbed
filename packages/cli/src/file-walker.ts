import * as fs from 'node:fs';
import * as path from 'node:path';
import { DirectoryReadError, PathNotFoundError } from './errors.js';
import { TEMP_FILE_SUFFIX } from './atomic-write.js';

// -- Types ---

export interface WalkOptions {
  readonly recurse: boolean;
  /** Wildcard patterns (`*`, `?`) matched against the file name. Empty = everything. */
  readonly include: readonly string[];
  readonly exclude: readonly string[];
  /** Extra per-name filter for files found inside directories. */
  readonly accept?: (fileName: string) => boolean;
}

/**
 * A file found under one of the input paths.
 */
export interface DiscoveredFile {
  readonly path: string;
  /** Path relative to the input it was found under (the bare file name for file inputs). */
  readonly relativePath: string;
  readonly fromDirectory: boolean;
}

export type WalkEntry =
  | { readonly ok: true; readonly file: DiscoveredFile }
  | { readonly ok: false; readonly path: string; readonly error: PathNotFoundError | DirectoryReadError };

// -- Public API ---

/**
 * Compile a `*` / `?` wildcard into an anchored, case-insensitive RegExp.
 */
export function wildcardToRegExp(pattern: string): RegExp {
  let source = '';
  for (const char of pattern) {
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 'i');
}

/**
 * Expand input paths into the files to process.
 *
 * Explicit file inputs are always returned. Directory contents are filtered by
 * include/exclude and `accept`; in-flight temp files are never returned.
 * Missing inputs and unreadable directories come back as failed entries in
 * walk order; the rest of the walk carries on.
 */
export function discoverFiles(inputs: readonly string[], options: WalkOptions): WalkEntry[] {
  const include = options.include.map(wildcardToRegExp);
  const exclude = options.exclude.map(wildcardToRegExp);

  const wanted = (name: string): boolean => {
    if (name.endsWith(TEMP_FILE_SUFFIX)) {
      return false;
    }
    if (include.length > 0 && !include.some((re) => re.test(name))) {
      return false;
    }
    if (exclude.some((re) => re.test(name))) {
      return false;
    }
    return options.accept ? options.accept(name) : true;
  };

  const entries: WalkEntry[] = [];

  for (const input of inputs) {
    const resolved = path.resolve(input);
    let stats: fs.Stats;
    try {
      stats = fs.statSync(resolved);
    } catch {
      entries.push({ ok: false, path: resolved, error: new PathNotFoundError(resolved) });
      continue;
    }

    if (stats.isDirectory()) {
      walkDirectory(resolved, '', options.recurse, wanted, entries);
    } else {
      entries.push({
        ok: true,
        file: { path: resolved, relativePath: path.basename(resolved), fromDirectory: false },
      });
    }
  }

  return entries;
}

// -- Internal Helpers ---

function walkDirectory(
  root: string,
  relativeDir: string,
  recurse: boolean,
  wanted: (name: string) => boolean,
  entries: WalkEntry[],
): void {
  const dir = path.join(root, relativeDir);
  let dirents: fs.Dirent[];
  try {
    dirents = fs.readdirSync(dir, { withFileTypes: true });
  } catch (cause) {
    entries.push({ ok: false, path: dir, error: new DirectoryReadError(dir, cause) });
    return;
  }
  dirents.sort((a, b) => a.name.localeCompare(b.name));

  for (const dirent of dirents) {
    const relativePath = path.join(relativeDir, dirent.name);
    // Symlinks are not followed, which also rules out directory cycles.
    if (dirent.isFile() && wanted(dirent.name)) {
      entries.push({
        ok: true,
        file: { path: path.join(root, relativePath), relativePath, fromDirectory: true },
      });
    } else if (dirent.isDirectory() && recurse) {
      walkDirectory(root, relativePath, recurse, wanted, entries);
    }
  }
}
