import { describe, it, expect } from 'vitest';
import { parseAmountText } from '../../src/services/amount-text/index.js';

function cents(text: string): number | undefined {
  const result = parseAmountText(text);
  return result.ok ? result.value : undefined;
}

function failure(text: string): string | undefined {
  const result = parseAmountText(text);
  if (result.ok) return undefined;
  expect(result.error.code).toBe('AMOUNT_PARSE_ERROR');
  expect(result.error.retryable).toBe(false);
  return result.error.message;
}

describe('parseAmountText', () => {
  describe('whole amounts', () => {
    it('parses scales and hundreds', () => {
      expect(cents('One Million Two Hundred Fifty Thousand Dollars')).toBe(125_000_000);
      expect(cents('One Million Two Hundred Thousand Dollars')).toBe(120_000_000);
      expect(cents('Two Billion')).toBe(200_000_000_000);
    });

    it('handles hyphenated tens and a trailing "only"', () => {
      expect(cents('Twenty-One Thousand Three Hundred Forty-Five Dollars Only')).toBe(2_134_500);
    });

    it('allows "and" after hundred and before a final group', () => {
      expect(cents('One Hundred and Five Dollars')).toBe(10_500);
      expect(cents('One Thousand and Five')).toBe(100_500);
    });

    it('allows "and" before any group that follows a scale', () => {
      expect(cents('One Million and Five Thousand Dollars')).toBe(100_500_000);
      expect(cents('One Million and Five Thousand and Ten Dollars')).toBe(100_501_000);
    });

    it('parses teens and zero', () => {
      expect(cents('Nineteen Dollars')).toBe(1_900);
      expect(cents('Zero Dollars')).toBe(0);
    });

    it('is case-insensitive', () => {
      expect(cents('FIVE HUNDRED DOLLARS')).toBe(50_000);
    });
  });

  describe('fractions and cents', () => {
    it('reads an NN/100 suffix', () => {
      expect(cents('Ten Dollars and 50/100')).toBe(1_050);
      expect(cents('One Thousand and 00/100 Dollars')).toBe(100_000);
    });

    it('reads written cents after dollars', () => {
      expect(cents('Five Dollars and Twenty Cents')).toBe(520);
    });

    it('reads zero cents on a whole-dollar amount', () => {
      expect(cents('Ten Dollars and Zero Cents')).toBe(1_000);
      expect(cents('One Million Two Hundred Fifty Thousand Dollars and Zero Cents')).toBe(125_000_000);
    });

    it('reads a cents-only amount', () => {
      expect(cents('Fifty Cents')).toBe(50);
    });
  });

  describe('rejections', () => {
    it('rejects text with no number words', () => {
      expect(failure('')).toBe("Cannot parse written amount '': no number words");
      expect(failure('Dollars')).toBe("Cannot parse written amount 'Dollars': no number words");
    });

    it('rejects unknown words instead of skipping them', () => {
      expect(failure('One Million USD')).toBe("Cannot parse written amount 'One Million USD': unexpected word 'usd'");
    });

    it('rejects digits and currency symbols', () => {
      expect(failure('$1,250,000')).toBe("Cannot parse written amount '$1,250,000': unsupported token '$1'");
    });

    it('rejects garbled sequences', () => {
      expect(failure('Twenty Thirty')).toBe("Cannot parse written amount 'Twenty Thirty': unexpected word 'thirty'");
      expect(failure('Two Three')).toBe("Cannot parse written amount 'Two Three': unexpected word 'three'");
      expect(failure('Hundred')).toBe("Cannot parse written amount 'Hundred': unexpected word 'hundred'");
      expect(failure('Twelve Hundred')).toBe("Cannot parse written amount 'Twelve Hundred': unexpected word 'hundred'");
    });

    it('rejects scales out of order or without a number', () => {
      expect(failure('One Thousand One Million')).toBe(
        "Cannot parse written amount 'One Thousand One Million': scale word 'million' is out of order",
      );
      expect(failure('Thousand Dollars')).toBe(
        "Cannot parse written amount 'Thousand Dollars': scale word 'thousand' has no number before it",
      );
    });

    it('rejects malformed cents phrases', () => {
      expect(failure('Five Dollars Fifty Cents')).toBe(
        "Cannot parse written amount 'Five Dollars Fifty Cents': expected 'and' between dollars and cents",
      );
      expect(failure('One Hundred Cents')).toBe(
        "Cannot parse written amount 'One Hundred Cents': cent amount 100 is not below 100",
      );
      expect(failure('and 50/100')).toBe("Cannot parse written amount 'and 50/100': fraction has no dollar amount before it");
      expect(failure('Ten and 50/100 Dollars Only Please')).toBe(
        "Cannot parse written amount 'Ten and 50/100 Dollars Only Please': unexpected word 'only' after fraction",
      );
    });
  });
});
