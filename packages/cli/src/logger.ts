/**
 * Stderr logger for human-readable status messages.
 *
 * All messages go to stderr so stdout remains JSON-only.
 * Set PATHGUARD_QUIET=1 to silence informational lines; warnings always print.
 */

function isQuiet(): boolean {
  const value = process.env['PATHGUARD_QUIET'];
  return value === '1' || value === 'true';
}

/**
 * Write a prefixed log message to stderr.
 *
 * @param message - Human-readable message (no newline needed)
 */
export function log(message: string): void {
  if (isQuiet()) {
    return;
  }
  process.stderr.write(`[pathguard] ${message}\n`);
}

/**
 * Write a prefixed warning to stderr. Not affected by PATHGUARD_QUIET.
 */
export function warn(message: string): void {
  process.stderr.write(`[pathguard] Warning: ${message}\n`);
}
