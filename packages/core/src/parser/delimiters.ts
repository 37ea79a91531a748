/**
 * Delimiter disambiguation
 *
 * Decides which of ".", "," and "'" is a thousands separator and which is the
 * decimal mark, and splits the amount into whole and fractional digits.
 */

import { InvalidAmountError } from '../errors/index.js';

/**
 * Amount text reduced to digits and separators, sign removed
 */
export interface CleanedAmount {
  digits: string;
  negative: boolean;
}

/**
 * Whole and fractional digit strings
 */
export interface AmountParts {
  major: string;
  minor: string;
}

const EDGE_HYPHEN = /^-|-$/;

/**
 * Strip everything but digits, separators and the sign
 *
 * A leading or trailing "-" marks the amount negative; any other "-" is rejected.
 * One trailing "." or "," is dropped ("12." → "12").
 */
export function cleanAmountText(text: string): CleanedAmount {
  let digits = text.replace(/[^\d.,'-]/g, '');

  const negative = EDGE_HYPHEN.test(digits);
  if (negative) {
    digits = digits.replace(EDGE_HYPHEN, '');
  }

  if (digits.includes('-')) {
    throw new InvalidAmountError('Invalid currency amount (hyphen)', text);
  }

  if (/[.,]$/.test(digits)) {
    digits = digits.slice(0, -1);
  }

  return { digits, negative };
}

function uniqueSeparators(digits: string): string[] {
  const seen: string[] = [];
  for (const char of digits) {
    if (/\d/.test(char)) continue;
    if (!seen.includes(char)) seen.push(char);
  }
  return seen;
}

function splitMajorMinor(digits: string, decimalMark: string): AmountParts {
  const [major = '', minor = ''] = digits.split(decimalMark);
  return { major, minor };
}

/**
 * Split cleaned digits into major and minor parts
 *
 * With two distinct separators the first one seen groups thousands and the second
 * is the decimal mark. A single separator is the decimal mark when it matches the
 * currency's own; otherwise a repeated separator groups thousands, and a lone one is
 * read from the width of the trailing group.
 */
export function disambiguateDelimiters(digits: string, decimalMark: string): AmountParts {
  const separators = uniqueSeparators(digits);

  switch (separators.length) {
    case 0:
      return { major: digits, minor: '0' };

    case 1: {
      const separator = separators[0];

      if (separator === decimalMark) {
        return splitMajorMinor(digits, separator);
      }

      if (digits.split(separator).length > 2) {
        return { major: digits.split(separator).join(''), minor: '0' };
      }

      const [head, tail] = digits.split(separator);
      const possibleMajor = head || '0';
      const possibleMinor = tail || '00';

      // a three-digit tail is what thousands grouping looks like
      if (possibleMinor.length !== 3) {
        return { major: possibleMajor, minor: possibleMinor };
      }
      if (possibleMajor.length > 3) {
        return { major: possibleMajor, minor: possibleMinor };
      }
      if (separator === '.') {
        return { major: possibleMajor, minor: possibleMinor };
      }
      return { major: `${possibleMajor}${possibleMinor}`, minor: '0' };
    }

    case 2: {
      const [thousandsSeparator, mark] = separators;
      return splitMajorMinor(digits.split(thousandsSeparator).join(''), mark);
    }

    default:
      throw new InvalidAmountError('Invalid currency amount', digits);
  }
}
