import * as crypto from 'node:crypto';
import { AllCharactersExcludedError } from './errors.js';

// -- Types ---

export interface RandomStringOptions {
  readonly length?: number;
  readonly lowercase?: boolean;
  readonly uppercase?: boolean;
  readonly numbers?: boolean;
  readonly symbols?: boolean;
  /** Characters that must never appear in the output. */
  readonly exclude?: string;
}

// -- Constants ---

const DEFAULT_LENGTH = 16;

export const CHARACTER_CLASSES = {
  lowercase: 'abcdefghijklmnopqrstuvwxyz',
  uppercase: 'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
  numbers: '0123456789',
  symbols: '!@#$%^&*()-_=+[]{};:,.<>?/|~',
} as const;

// -- Public API ---

/**
 * The distinct characters a random string may be drawn from.
 * Every class is on unless explicitly turned off.
 */
export function buildCharacterPool(options: RandomStringOptions = {}): string[] {
  const excluded = new Set(options.exclude ?? '');
  const selected = [
    options.lowercase !== false ? CHARACTER_CLASSES.lowercase : '',
    options.uppercase !== false ? CHARACTER_CLASSES.uppercase : '',
    options.numbers !== false ? CHARACTER_CLASSES.numbers : '',
    options.symbols !== false ? CHARACTER_CLASSES.symbols : '',
  ].join('');

  return [...new Set(selected)].filter((char) => !excluded.has(char));
}

/**
 * Generate a string of uniformly chosen characters using a CSPRNG.
 *
 * @throws RangeError if length is not a positive integer
 * @throws AllCharactersExcludedError if no character is left to choose from
 */
export function generateRandomString(options: RandomStringOptions = {}): string {
  const length = options.length ?? DEFAULT_LENGTH;
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError(`length must be a positive integer, got ${length}`);
  }

  const pool = buildCharacterPool(options);
  if (pool.length === 0) {
    throw new AllCharactersExcludedError();
  }

  let result = '';
  for (let i = 0; i < length; i++) {
    result += pool[crypto.randomInt(pool.length)] ?? '';
  }
  return result;
}
