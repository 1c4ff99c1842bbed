import { Command, Option } from 'commander';
import { realpathSync } from 'node:fs';
import { protectPaths, unprotectPaths } from './file-orchestrator.js';
import type { BatchReport } from './file-orchestrator.js';
import { resolvePassphrase, PromptCancelledError } from './password-prompt.js';
import { loadConfig, resolveFileOptions } from './config.js';
import type { ResolvedFileOptions } from './config.js';
import { generateRandomString } from './random-string.js';
import { convertLineEndings } from './line-endings.js';
import type { LineEnding } from './line-endings.js';
import { AllCharactersExcludedError, ConfigError, NoPasswordError } from './errors.js';
import { outputJson, outputError } from './output.js';
import type { Passphrase } from './passphrase.js';

// -- Types ---

interface FileCommandOptions {
  readonly password?: string;
  readonly output?: string;
  readonly recurse?: boolean;
  readonly force?: boolean;
  readonly dryRun?: boolean;
  readonly include?: string[];
  readonly exclude?: string[];
}

interface ProtectCommandOptions extends FileCommandOptions {
  readonly removeOriginal?: boolean;
}

interface UnprotectCommandOptions extends FileCommandOptions {
  readonly keepEncrypted?: boolean;
}

// -- Constants ---

const EXIT_FAILURE = 1;
const EXIT_NO_PASSWORD = 2;
const EXIT_INTERRUPTED = 130;

// -- Internal Helpers ---

function handleError(error: unknown, defaultCode: string, exitCode: number): void {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof ConfigError) {
    outputError('invalid_config', message, EXIT_FAILURE);
  } else if (error instanceof NoPasswordError) {
    outputError('no_password', message, EXIT_NO_PASSWORD);
  } else if (error instanceof PromptCancelledError) {
    outputError('cancelled', message, EXIT_INTERRUPTED);
  } else {
    outputError(defaultCode, message, exitCode);
  }
}

function addFileOptions(command: Command): Command {
  return command
    .option('-p, --password <password>', 'Password (otherwise PATHGUARD_PASSWORD or an interactive prompt)')
    .option('-o, --output <path>', 'Output file, or output directory when several files are processed')
    .option('-r, --recurse', 'Descend into sub-directories')
    .option('-f, --force', 'Overwrite outputs that already exist')
    .option('--dry-run', 'Report what would happen without writing anything')
    .option('--include <patterns...>', 'Only process files whose name matches (wildcards: * ?)')
    .option('--exclude <patterns...>', 'Skip files whose name matches (wildcards: * ?)');
}

/**
 * Shared flow for protect/unprotect: config, passphrase, batch, JSON report, exit code.
 * SIGINT aborts the batch between files instead of killing the process mid-write.
 */
async function runFileCommand(
  options: FileCommandOptions,
  confirmPassword: boolean,
  run: (passphrase: Passphrase, resolved: ResolvedFileOptions, signal: AbortSignal) => Promise<BatchReport>,
): Promise<void> {
  const resolved = resolveFileOptions(options, loadConfig());
  const passphrase = await resolvePassphrase({
    password: options.password,
    confirm: confirmPassword && !options.dryRun,
  });

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    const report = await run(passphrase, resolved, controller.signal);
    outputJson(report);
    if (!report.ok) {
      process.exitCode = controller.signal.aborted ? EXIT_INTERRUPTED : EXIT_FAILURE;
    }
  } finally {
    passphrase.dispose();
    process.removeListener('SIGINT', onInterrupt);
  }
}

// -- Public API ---

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('pathguard')
    .version('0.1.0')
    .description('Password-based file encryption and small file utilities');

  // ── File protection ────────────────────────────────────────

  addFileOptions(
    program
      .command('protect')
      .description('Encrypt files (AES-256-CBC, PBKDF2-SHA256 key) into <name>.enc')
      .argument('<paths...>', 'Files or directories to encrypt'),
  )
    .option('--remove-original', 'Delete each source file after it has been encrypted')
    .action(async (paths: string[], options: ProtectCommandOptions) => {
      try {
        await runFileCommand(options, true, (passphrase, resolved, signal) =>
          protectPaths(paths, passphrase, {
            ...resolved,
            outputPath: options.output,
            dryRun: options.dryRun ?? false,
            removeOriginal: options.removeOriginal ?? false,
            signal,
          }),
        );
      } catch (error: unknown) {
        handleError(error, 'protect_failed', EXIT_FAILURE);
      }
    });

  addFileOptions(
    program
      .command('unprotect')
      .description('Decrypt .enc files produced by protect')
      .argument('<paths...>', 'Encrypted files or directories containing them'),
  )
    .option('--keep-encrypted', 'Keep each .enc file after it has been decrypted')
    .action(async (paths: string[], options: UnprotectCommandOptions) => {
      try {
        await runFileCommand(options, false, (passphrase, resolved, signal) =>
          unprotectPaths(paths, passphrase, {
            ...resolved,
            outputPath: options.output,
            dryRun: options.dryRun ?? false,
            keepEncrypted: options.keepEncrypted ?? false,
            signal,
          }),
        );
      } catch (error: unknown) {
        handleError(error, 'unprotect_failed', EXIT_FAILURE);
      }
    });

  // ── Utilities ──────────────────────────────────────────────

  program
    .command('random-string')
    .description('Generate random strings from a CSPRNG')
    .option('-l, --length <number>', 'Characters per string', '16')
    .option('-c, --count <number>', 'How many strings to generate', '1')
    .option('-x, --exclude <chars>', 'Characters to leave out', '')
    .option('--no-lowercase', 'Leave out a-z')
    .option('--no-uppercase', 'Leave out A-Z')
    .option('--no-numbers', 'Leave out 0-9')
    .option('--no-symbols', 'Leave out punctuation')
    .action((options: {
      length: string;
      count: string;
      exclude: string;
      lowercase: boolean;
      uppercase: boolean;
      numbers: boolean;
      symbols: boolean;
    }) => {
      try {
        const count = parseInt(options.count, 10);
        if (!Number.isInteger(count) || count < 1) {
          outputError('invalid_args', `--count must be a positive integer, got "${options.count}"`, EXIT_FAILURE);
          return;
        }

        const values: string[] = [];
        for (let i = 0; i < count; i++) {
          values.push(generateRandomString({ ...options, length: Number(options.length) }));
        }
        outputJson({ ok: true, values });
      } catch (error: unknown) {
        if (error instanceof AllCharactersExcludedError) {
          outputError('all_characters_excluded', error.message, EXIT_FAILURE);
        } else {
          handleError(error, 'invalid_args', EXIT_FAILURE);
        }
      }
    });

  program
    .command('line-endings')
    .description('Convert text files to LF or CRLF line endings in place')
    .argument('<paths...>', 'Files or directories to convert')
    .addOption(new Option('--to <ending>', 'Target line ending').choices(['lf', 'crlf']).default('lf'))
    .option('-r, --recurse', 'Descend into sub-directories')
    .option('--dry-run', 'Report what would change without writing anything')
    .option('--include <patterns...>', 'Only process files whose name matches (wildcards: * ?)')
    .option('--exclude <patterns...>', 'Skip files whose name matches (wildcards: * ?)')
    .action(async (paths: string[], options: {
      to: LineEnding;
      recurse?: boolean;
      dryRun?: boolean;
      include?: string[];
      exclude?: string[];
    }) => {
      try {
        const results = await convertLineEndings(paths, options);
        const ok = results.every((r) => r.status !== 'failed');
        outputJson({ ok, results });
        if (!ok) {
          process.exitCode = EXIT_FAILURE;
        }
      } catch (error: unknown) {
        handleError(error, 'line_endings_failed', EXIT_FAILURE);
      }
    });

  return program;
}

// Only parse when run directly (not imported in tests).
// Resolve symlinks so `pathguard` (a symlink to dist/cli.js) is detected.
const resolvedArgv = process.argv[1] ? realpathSync(process.argv[1]) : '';
const isDirectRun = resolvedArgv.endsWith('cli.ts') || resolvedArgv.endsWith('cli.js');

if (isDirectRun) {
  const program = buildProgram();
  program.parseAsync().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    outputError('unexpected_error', message, EXIT_FAILURE);
  });
}
