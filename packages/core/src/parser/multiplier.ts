import type { MultiplierExponent } from '../types/index.js';

const MULTIPLIER_SUFFIXES: Record<string, MultiplierExponent> = {
  K: 3,
  M: 6,
  B: 9,
  T: 12,
};

// digit, suffix, then nothing numeric until the end
const MULTIPLIER_PATTERN = /\d(K|M|B|T)\b[^\d]*$/i;

/**
 * Exponent of a trailing magnitude suffix ("1.5M" → 6), or 0 without one
 */
export function extractMultiplierExponent(text: string): MultiplierExponent {
  const match = MULTIPLIER_PATTERN.exec(text);
  if (!match) return 0;
  return MULTIPLIER_SUFFIXES[match[1].toUpperCase()] ?? 0;
}
