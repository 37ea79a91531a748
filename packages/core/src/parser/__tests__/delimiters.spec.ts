import { describe, it, expect } from 'vitest';
import { InvalidAmountError } from '../../errors/index.js';
import { cleanAmountText, disambiguateDelimiters } from '../delimiters.js';

describe('cleanAmountText', () => {
  it('keeps digits and separators only', () => {
    expect(cleanAmountText('$1,234.56')).toEqual({ digits: '1,234.56', negative: false });
    expect(cleanAmountText("CHF 1'234.50")).toEqual({ digits: "1'234.50", negative: false });
    expect(cleanAmountText('1.5M')).toEqual({ digits: '1.5', negative: false });
  });

  it('reads a leading or trailing hyphen as a negative sign', () => {
    expect(cleanAmountText('-£12')).toEqual({ digits: '12', negative: true });
    expect(cleanAmountText('12-')).toEqual({ digits: '12', negative: true });
  });

  it('rejects a hyphen in the middle', () => {
    expect(() => cleanAmountText('12-34')).toThrow(InvalidAmountError);
    expect(() => cleanAmountText('12-34')).toThrow('Invalid currency amount (hyphen)');
  });

  it('rejects hyphens at both ends', () => {
    expect(() => cleanAmountText('-12-')).toThrow(InvalidAmountError);
  });

  it('drops one trailing separator', () => {
    expect(cleanAmountText('12.')).toEqual({ digits: '12', negative: false });
    expect(cleanAmountText('12,')).toEqual({ digits: '12', negative: false });
  });

  it('returns empty digits for text without numbers', () => {
    expect(cleanAmountText('n/a')).toEqual({ digits: '', negative: false });
  });
});

describe('disambiguateDelimiters', () => {
  describe('no separator', () => {
    it('uses every digit as the major part', () => {
      expect(disambiguateDelimiters('1234', '.')).toEqual({ major: '1234', minor: '0' });
    });

    it('passes empty digits through', () => {
      expect(disambiguateDelimiters('', '.')).toEqual({ major: '', minor: '0' });
    });
  });

  describe('two separators', () => {
    it('reads "1,234.56" with a dot decimal mark', () => {
      expect(disambiguateDelimiters('1,234.56', '.')).toEqual({ major: '1234', minor: '56' });
    });

    it('reads "1.234,56" with a comma decimal mark', () => {
      expect(disambiguateDelimiters('1.234,56', ',')).toEqual({ major: '1234', minor: '56' });
    });

    it('takes the order of appearance over the currency convention', () => {
      expect(disambiguateDelimiters('1,234.56', ',')).toEqual({ major: '1234', minor: '56' });
    });

    it('handles apostrophe grouping', () => {
      expect(disambiguateDelimiters("1'234.50", '.')).toEqual({ major: '1234', minor: '50' });
    });
  });

  describe('one separator', () => {
    it('splits on the currency decimal mark', () => {
      expect(disambiguateDelimiters('12.34', '.')).toEqual({ major: '12', minor: '34' });
      expect(disambiguateDelimiters('1234,5', ',')).toEqual({ major: '1234', minor: '5' });
    });

    it('keeps the first two groups when the decimal mark repeats', () => {
      expect(disambiguateDelimiters('1.234.567', '.')).toEqual({ major: '1', minor: '234' });
    });

    it('treats a repeated foreign separator as grouping', () => {
      expect(disambiguateDelimiters('1,234,567', '.')).toEqual({ major: '1234567', minor: '0' });
      expect(disambiguateDelimiters('1.234.567', ',')).toEqual({ major: '1234567', minor: '0' });
    });

    it('treats a foreign separator as decimal when the tail is not three digits', () => {
      expect(disambiguateDelimiters('12,5', '.')).toEqual({ major: '12', minor: '5' });
      expect(disambiguateDelimiters('12.50', ',')).toEqual({ major: '12', minor: '50' });
    });

    it('treats a foreign separator as decimal when the head is longer than three digits', () => {
      expect(disambiguateDelimiters('1234,567', '.')).toEqual({ major: '1234', minor: '567' });
    });

    it('treats a lone dot before three digits as decimal', () => {
      expect(disambiguateDelimiters('1.234', ',')).toEqual({ major: '1', minor: '234' });
    });

    it('treats a lone comma before three digits as grouping', () => {
      expect(disambiguateDelimiters('1,234', '.')).toEqual({ major: '1234', minor: '0' });
      expect(disambiguateDelimiters("1'234", '.')).toEqual({ major: '1234', minor: '0' });
    });

    it('defaults a missing major side to zero', () => {
      expect(disambiguateDelimiters(',5', '.')).toEqual({ major: '0', minor: '5' });
    });

    it('defaults a missing minor side to "00"', () => {
      expect(disambiguateDelimiters("5'", '.')).toEqual({ major: '5', minor: '00' });
    });
  });

  describe('three or more separators', () => {
    it('throws InvalidAmountError', () => {
      expect(() => disambiguateDelimiters("1.2,3'4", '.')).toThrow(InvalidAmountError);
      expect(() => disambiguateDelimiters("1.2,3'4", '.')).toThrow('Invalid currency amount');
    });
  });
});
