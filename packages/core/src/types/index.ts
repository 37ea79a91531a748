export type { Money, MultiplierExponent, ParsedAmount } from './money.js';
