import { Decimal } from 'decimal.js';

/**
 * Decimal constructor whose arithmetic never rounds in practice and whose
 * string form never switches to exponential notation
 */
export const ExactDecimal: Decimal.Constructor = Decimal.clone({
  precision: 1e9,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -9e15,
  toExpPos: 9e15,
});
