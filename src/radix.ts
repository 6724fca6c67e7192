// src/radix.ts - Number systems: literal classification, conversion, output
import { NumberSystem } from './types';

/**
 * Classifies a literal by its prefix. A leading minus sign is ignored.
 *
 * `0x`/`0X` is hex, a leading `b`/`B` is binary, a leading `0` on a longer
 * literal without a decimal point is octal, anything else is decimal.
 */
export function parseNumberSystem(literal: string): NumberSystem {
  const digits = literal.startsWith('-') ? literal.slice(1) : literal;
  const first = digits.charAt(0);
  if (first === 'b' || first === 'B') return 'bin';
  if (first === '0' && digits.length > 1) {
    if (digits[1] === 'x' || digits[1] === 'X') return 'hex';
    if (!digits.includes('.')) return 'oct';
  }
  return 'dec';
}

const literalPatterns: Record<NumberSystem, RegExp> = {
  dec: /^\d+(\.\d*)?$/,
  hex: /^0x[0-9a-f]+$/,
  oct: /^0[0-7]+$/,
  bin: /^b[01]+$/,
};

/**
 * Numeric value of a literal in the given system, or null when the text is
 * not a well-formed literal of that system (`089`, a bare `0x`, overflow).
 */
export function literalValue(
  literal: string,
  system: NumberSystem
): number | null {
  const negative = literal.startsWith('-');
  const body = (negative ? literal.slice(1) : literal).toLowerCase();
  if (!literalPatterns[system].test(body)) return null;

  let magnitude: number;
  switch (system) {
    case 'dec':
      magnitude = Number(body);
      break;
    case 'hex':
      magnitude = parseInt(body.slice(2), 16);
      break;
    case 'oct':
      magnitude = parseInt(body.slice(1), 8);
      break;
    default: // bin
      magnitude = parseInt(body.slice(1), 2);
      break;
  }
  if (!Number.isFinite(magnitude)) return null;
  return negative ? -magnitude : magnitude;
}

/**
 * Shortest decimal text for a finite number, never in exponent notation.
 */
export function formatDecimal(n: number): string {
  const text = String(n);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;
  const [, sign, lead, fraction = '', exponent] = match;
  const digits = lead + fraction;
  const shift = Number(exponent);
  if (shift < 0) {
    return `${sign}0.${'0'.repeat(-shift - 1)}${digits}`;
  }
  // String() only switches to exponents from 1e21 up, past every fraction digit
  return sign + digits + '0'.repeat(shift - fraction.length);
}

/**
 * Canonical literal for `n` in the requested system; the text lexes back to
 * a number of that same system. Null when a non-decimal system is asked to
 * show a fraction.
 */
export function formatNumber(n: number, system: NumberSystem): string | null {
  if (system === 'dec') return formatDecimal(n);
  if (!Number.isInteger(n)) return null;

  const sign = n < 0 ? '-' : '';
  const magnitude = Math.abs(n);
  switch (system) {
    case 'hex':
      return `${sign}0x${magnitude.toString(16)}`;
    case 'oct':
      return `${sign}0${magnitude.toString(8)}`;
    default: // bin
      return `${sign}b${magnitude.toString(2)}`;
  }
}
