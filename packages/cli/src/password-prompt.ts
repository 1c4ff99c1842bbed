import password from '@inquirer/password';
import { Passphrase } from './passphrase.js';
import { NoPasswordError } from './errors.js';

// -- Types ---

/**
 * Options for password prompting.
 */
export interface PromptOptions {
  /** Custom message shown to the user. Defaults to 'Enter password:'. */
  readonly message?: string;
  /** Optional validation function. Return string on failure (error message), true on success. */
  readonly validate?: (input: string) => string | true;
}

/**
 * Result of a password prompt attempt.
 */
export interface PromptResult {
  readonly ok: true;
  readonly password: string;
}

/**
 * Where a passphrase may come from, checked in order: explicit value,
 * PATHGUARD_PASSWORD, interactive prompt.
 */
export interface PassphraseSources {
  readonly password?: string;
  /** Ask a second time and require a match (used when encrypting). */
  readonly confirm?: boolean;
  /** Whether prompting is possible. Defaults to stdin being a TTY. */
  readonly interactive?: boolean;
}

/**
 * Error when user cancels the prompt (Ctrl+C / ESC).
 */
export class PromptCancelledError extends Error {
  constructor() {
    super('Password prompt cancelled by user');
    this.name = 'PromptCancelledError';
  }
}

// -- Constants ---

const DEFAULT_MESSAGE = 'Enter password:';
const PASSWORD_ENV_VAR = 'PATHGUARD_PASSWORD';

// -- Public API ---

/**
 * Prompt user for a password with masked input using @inquirer/password.
 *
 * @param options - Prompt configuration
 * @returns The entered password wrapped in a PromptResult
 * @throws PromptCancelledError if user cancels (Ctrl+C)
 */
export async function promptForPassword(options: PromptOptions = {}): Promise<PromptResult> {
  const message = options.message ?? DEFAULT_MESSAGE;
  const validate = options.validate;

  try {
    const input = await password({
      message,
      mask: '*',
      validate: validate ? (value: string) => validate(value) : undefined,
    });

    return { ok: true, password: input };
  } catch (error: unknown) {
    // @inquirer/password throws ExitPromptError on Ctrl+C
    if (isExitPromptError(error)) {
      throw new PromptCancelledError();
    }
    throw error;
  }
}

/**
 * Obtain the passphrase for a batch as a Passphrase secret.
 *
 * @throws NoPasswordError if no value is given and prompting is impossible
 * @throws PromptCancelledError if the user aborts the prompt
 */
export async function resolvePassphrase(sources: PassphraseSources = {}): Promise<Passphrase> {
  const given = sources.password ?? process.env[PASSWORD_ENV_VAR];
  if (given) {
    return Passphrase.fromString(given);
  }

  const interactive = sources.interactive ?? process.stdin.isTTY === true;
  if (!interactive) {
    throw new NoPasswordError();
  }

  const first = await promptForPassword({
    validate: (value) => (value.length > 0 ? true : 'Password cannot be empty'),
  });

  if (sources.confirm) {
    await promptForPassword({
      message: 'Confirm password:',
      validate: (value) => (value === first.password ? true : 'Passwords do not match'),
    });
  }

  return Passphrase.fromString(first.password);
}

// -- Internal Helpers ---

function isExitPromptError(error: unknown): boolean {
  if (error instanceof Error) {
    return error.name === 'ExitPromptError';
  }
  return false;
}
