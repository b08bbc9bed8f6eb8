import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { MoneyDecimal, dec, parseDecimal, powerOfTen, toMoneyDecimal } from '../decimal.js';
import { InvalidAmountError } from '../errors.js';

import { assertErr, assertOk } from './test-utils.js';

describe('Decimal support', () => {
  describe('dec', () => {
    it('should build a Decimal from a string literal', () => {
      expect(dec('10.50').toString()).toBe('10.5');
    });

    it('should build a Decimal from a number', () => {
      expect(dec(42).toString()).toBe('42');
    });
  });

  describe('parseDecimal', () => {
    it('should parse a decimal string', () => {
      expect(assertOk(parseDecimal('12.34')).toString()).toBe('12.34');
    });

    it('should trim surrounding whitespace', () => {
      expect(assertOk(parseDecimal('  7 ')).toString()).toBe('7');
    });

    it('should accept scientific notation', () => {
      expect(assertOk(parseDecimal('1e3')).toFixed()).toBe('1000');
    });

    it('should accept Decimal instances', () => {
      expect(assertOk(parseDecimal(new Decimal('-0.5'))).toString()).toBe('-0.5');
    });

    it('should reject empty strings', () => {
      const error = assertErr(parseDecimal('   '));

      expect(error).toBeInstanceOf(InvalidAmountError);
      expect(error.reason).toBe('empty string');
    });

    it('should reject malformed strings', () => {
      expect(assertErr(parseDecimal('abc')).code).toBe('INVALID_AMOUNT');
      expect(assertErr(parseDecimal('12.34.56')).code).toBe('INVALID_AMOUNT');
    });

    it('should accept signs and bare fractions', () => {
      expect(assertOk(parseDecimal('-.5')).toString()).toBe('-0.5');
      expect(assertOk(parseDecimal('+7')).toString()).toBe('7');
      expect(assertOk(parseDecimal('2.5E-2')).toString()).toBe('0.025');
    });

    it('should reject hexadecimal, binary and octal literals', () => {
      for (const literal of ['0x10', '0b101', '0o17']) {
        const error = assertErr(parseDecimal(literal));

        expect(error.reason).toBe('not a decimal number');
        expect(error.value).toBe(literal);
      }
    });

    it('should reject NaN and infinities', () => {
      expect(assertErr(parseDecimal(Number.NaN)).reason).toBe('amount must be finite');
      expect(assertErr(parseDecimal(Number.POSITIVE_INFINITY)).reason).toBe('amount must be finite');
      expect(assertErr(parseDecimal('Infinity')).reason).toBe('not a decimal number');
    });
  });

  describe('working precision', () => {
    it('should carry 50 significant digits through division', () => {
      expect(dec(1).div(3).toFixed()).toBe(`0.${'3'.repeat(50)}`);
    });

    it('should leave the global decimal.js configuration untouched', () => {
      expect(Decimal.precision).toBe(20);
      expect(MoneyDecimal.precision).toBe(50);
    });

    it('should copy digits when rebinding a foreign Decimal', () => {
      const foreign = new Decimal('0.1234567890123456789012345678901234');

      expect(toMoneyDecimal(foreign).toFixed()).toBe('0.1234567890123456789012345678901234');
    });
  });

  describe('powerOfTen', () => {
    it('should build exact powers of ten', () => {
      expect(powerOfTen(-2).toString()).toBe('0.01');
      expect(powerOfTen(3).toString()).toBe('1000');
      expect(powerOfTen(0).toString()).toBe('1');
    });
  });
});
