/**
 * Nucleotide codec: bases <-> digits modulo 4
 *
 * A=0, T=1, G=2, C=3. Lookup is case-insensitive; output is always uppercase.
 */
import { ALPHABET, PARITY, type Base } from '../utils/constants.js';

export type Digit = 0 | 1 | 2 | 3;

const DIGITS = [0, 1, 2, 3] as const;

// Indexed by char code, -1 for anything outside the alphabet
const DIGIT_TABLE = new Int8Array(256).fill(-1);

(function initDigitTable() {
  ALPHABET.forEach((base, digit) => {
    DIGIT_TABLE[base.charCodeAt(0)] = digit;
    DIGIT_TABLE[base.toLowerCase().charCodeAt(0)] = digit;
  });
})();

/**
 * Digit for a char code, or -1 if it is not a base
 */
export function codeToDigit(code: number): number {
  return code >= 0 && code < DIGIT_TABLE.length ? DIGIT_TABLE[code] : -1;
}

/**
 * Map a base to its digit
 * @returns null if `symbol` is not a single A/T/G/C (either case)
 */
export function baseToDigit(symbol: string): Digit | null {
  if (symbol.length !== 1) return null;
  const digit = codeToDigit(symbol.charCodeAt(0));
  return digit < 0 ? null : mod4(digit);
}

/**
 * Map a digit in [0, 4) back to its base
 */
export function digitToBase(digit: number): Base {
  if (!Number.isInteger(digit) || digit < 0 || digit >= PARITY.MODULUS) {
    throw new RangeError(`Digit out of range: ${digit}`);
  }
  return ALPHABET[digit];
}

/**
 * Uppercase canonical form of a base, or null
 */
export function normalizeBase(symbol: string): Base | null {
  const digit = baseToDigit(symbol);
  return digit === null ? null : ALPHABET[digit];
}

export function isBase(symbol: string): symbol is Base {
  return ALPHABET.some(base => base === symbol);
}

/**
 * Non-negative residue modulo 4
 */
export function mod4(n: number): Digit {
  return DIGITS[((n % PARITY.MODULUS) + PARITY.MODULUS) % PARITY.MODULUS];
}

/**
 * Index of the first character that is not a base, or -1
 */
export function findInvalidBase(sequence: string): number {
  for (let i = 0; i < sequence.length; i++) {
    if (codeToDigit(sequence.charCodeAt(i)) < 0) {
      return i;
    }
  }
  return -1;
}
