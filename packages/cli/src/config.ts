import { z } from 'zod';
import { readJsonFile } from './storage.js';
import { ConfigError } from './errors.js';

// -- Types ---

const ConfigSchema = z
  .object({
    include: z.array(z.string().min(1)).optional(),
    exclude: z.array(z.string().min(1)).optional(),
    recurse: z.boolean().optional(),
    force: z.boolean().optional(),
  })
  .strict();

/**
 * Defaults for the file commands, read from ~/.pathguard/config.json.
 */
export type PathguardConfig = z.infer<typeof ConfigSchema>;

interface CliFileOptions {
  readonly include?: string[];
  readonly exclude?: string[];
  readonly recurse?: boolean;
  readonly force?: boolean;
}

export interface ResolvedFileOptions {
  readonly include: readonly string[];
  readonly exclude: readonly string[];
  readonly recurse: boolean;
  readonly force: boolean;
}

// -- Constants ---

const CONFIG_FILENAME = 'config.json';

// -- Public API ---

/**
 * Load and validate the config file. A missing file yields an empty config.
 *
 * @throws ConfigError if the file cannot be read, is not valid JSON or fails validation
 */
export function loadConfig(): PathguardConfig {
  let raw: unknown;
  try {
    raw = readJsonFile(CONFIG_FILENAME);
  } catch (cause) {
    if (cause instanceof SyntaxError) {
      throw new ConfigError(`${CONFIG_FILENAME} is not valid JSON`, cause);
    }
    const reason = cause instanceof Error ? cause.message : String(cause);
    throw new ConfigError(`Cannot read ${CONFIG_FILENAME}: ${reason}`, cause);
  }

  if (raw === null) {
    return {};
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${CONFIG_FILENAME}: ${detail}`, parsed.error);
  }

  return parsed.data;
}

/**
 * Merge CLI flags over config file values. Flags win when given.
 */
export function resolveFileOptions(cli: CliFileOptions, config: PathguardConfig): ResolvedFileOptions {
  return {
    include: cli.include ?? config.include ?? [],
    exclude: cli.exclude ?? config.exclude ?? [],
    recurse: cli.recurse ?? config.recurse ?? false,
    force: cli.force ?? config.force ?? false,
  };
}
