import { randomInt } from 'node:crypto';

export const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';
export const UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const DIGITS = '0123456789';
export const PUNCTUATION = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';

export const MIN_PASSWORD_LENGTH = 4;
export const MAX_PASSWORD_LENGTH = 128;
export const DEFAULT_PASSWORD_LENGTH = 12;

export interface PasswordOptions {
  length?: number;
  includeSpecialChars?: boolean;
}

/**
 * Generates passwords from a CSPRNG.
 *
 * Every generated password holds at least one character of each enabled
 * class (lowercase, uppercase, digit and, optionally, punctuation).
 */
export class PasswordGenerator {
  private readonly length: number;
  private readonly includeSpecialChars: boolean;

  constructor(options: PasswordOptions = {}) {
    const length = options.length ?? DEFAULT_PASSWORD_LENGTH;
    if (!Number.isInteger(length) || length < MIN_PASSWORD_LENGTH || length > MAX_PASSWORD_LENGTH) {
      throw new RangeError(
        `Password length must be an integer between ${MIN_PASSWORD_LENGTH} and ${MAX_PASSWORD_LENGTH}`
      );
    }
    this.length = length;
    this.includeSpecialChars = options.includeSpecialChars ?? false;
  }

  generate(): string {
    const classes = [LOWERCASE, UPPERCASE, DIGITS];
    if (this.includeSpecialChars) {
      classes.push(PUNCTUATION);
    }
    const alphabet = classes.join('');

    const chars = classes.map(pickOne);
    while (chars.length < this.length) {
      chars.push(pickOne(alphabet));
    }

    // Fisher-Yates shuffle
    for (let i = chars.length - 1; i > 0; i--) {
      const j = randomInt(i + 1);
      [chars[i], chars[j]] = [chars[j], chars[i]];
    }

    return chars.join('');
  }
}

function pickOne(charset: string): string {
  return charset.charAt(randomInt(charset.length));
}
