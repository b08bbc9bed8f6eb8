import { resetLogger } from '@fintick/logger';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { Currency } from '../currency.js';
import { dec } from '../decimal.js';
import { InvalidCurrencyError, InvalidPayloadError } from '../errors.js';
import { Money } from '../money.js';
import { currencyFromJSON, moneyFromJSON } from '../schemas/money.schema.js';

import { assertErr, assertOk } from './test-utils.js';

describe('money serialization', () => {
  describe('toJSON', () => {
    it('should write the amount as a plain decimal string', () => {
      expect(Money.of(dec('10.50'), Currency.USD).toJSON()).toStrictEqual({
        amount: '10.5',
        currency: { id: 1, code: 'USD', name: 'US Dollar', decimalPlaces: 2 },
      });
    });

    it('should avoid exponent notation at both ends of the range', () => {
      expect(Money.of(dec('0.00000001'), Currency.BTC).toJSON().amount).toBe('0.00000001');
      expect(Money.of(dec('123456789012345678901234.5678'), Currency.USD).toJSON().amount).toBe(
        '123456789012345678901234.5678'
      );
    });
  });

  describe('moneyFromJSON', () => {
    it('should round-trip through JSON text exactly', () => {
      const original = Money.of(dec('10.123456789012345678'), Currency.ETH);

      const restored = assertOk(moneyFromJSON(JSON.parse(JSON.stringify(original))));

      expect(restored.equals(original)).toBe(true);
      expect(restored.amount.toFixed()).toBe('10.123456789012345678');
      expect(restored.currency.toJSON()).toEqual(Currency.ETH.toJSON());
    });

    it('should round-trip signed, zero, tiny and large amounts across currencies', () => {
      const micro = assertOk(Currency.create(20, 'MICRO', 'Micro unit', 28));
      const cases: [string, Currency][] = [
        ['-1234.5678', Currency.USD],
        ['0', Currency.BTC],
        [`0.${'0'.repeat(27)}1`, micro],
        ['123456789012345678901.25', Currency.EUR],
        ['-0.000000000000000001', Currency.ETH],
        ['1000000', Currency.JPY],
      ];

      for (const [amount, currency] of cases) {
        const original = Money.of(dec(amount), currency);
        const restored = assertOk(moneyFromJSON(JSON.parse(JSON.stringify(original))));

        expect(restored.amount.toFixed()).toBe(amount);
        expect(restored.equals(original)).toBe(true);
        expect(restored.currency.toJSON()).toEqual(currency.toJSON());
      }
    });

    it('should restore a currency without a name', () => {
      const currency = assertOk(Currency.create(12, 'PTS', undefined, 0));
      const restored = assertOk(moneyFromJSON(Money.of(dec('-42'), currency).toJSON()));

      expect(restored.toString()).toBe('-42 PTS');
      expect(restored.currency.name).toBeUndefined();
    });

    it('should reject a numeric amount', () => {
      const error = assertErr(moneyFromJSON({ amount: 10.5, currency: Currency.USD.toJSON() }));

      expect(error).toBeInstanceOf(InvalidPayloadError);
      if (!(error instanceof InvalidPayloadError)) return;
      expect(error.issues).toEqual(['amount: Expected string, received number']);
    });

    it('should reject exponent notation', () => {
      const error = assertErr(moneyFromJSON({ amount: '1e5', currency: Currency.USD.toJSON() }));

      expect(error.message).toBe('Invalid money payload: amount: Amount must be a plain decimal string');
    });

    it('should reject non-object input', () => {
      const error = assertErr(moneyFromJSON(null));

      expect(error.code).toBe('INVALID_PAYLOAD');
      expect(error.message).toBe('Invalid money payload: Expected object, received null');
    });

    it('should reject an invalid currency', () => {
      const error = assertErr(
        moneyFromJSON({ amount: '1', currency: { id: 1, code: 'TOO LONG CODE', decimalPlaces: 2 } })
      );

      expect(error).toBeInstanceOf(InvalidCurrencyError);
    });

    it('should reject out-of-range decimal places', () => {
      const error = assertErr(moneyFromJSON({ amount: '1', currency: { id: 1, code: 'USD', decimalPlaces: 40 } }));

      expect(error.message).toBe('Invalid currency: decimal places must be an integer between 0 and 28, received: 40');
    });
  });

  describe('with an invalid logger environment', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
      resetLogger();
    });

    it('should still return a Result for a rejected payload', () => {
      vi.stubEnv('LOGGER_LOG_LEVEL', 'verbose');
      resetLogger();

      const error = assertErr(moneyFromJSON({ amount: 1 }));

      expect(error).toBeInstanceOf(InvalidPayloadError);
    });
  });

  describe('currencyFromJSON', () => {
    it('should rebuild a predefined currency', () => {
      const currency = assertOk(currencyFromJSON(Currency.BTC.toJSON()));

      expect(currency.equals(Currency.BTC)).toBe(true);
      expect(currency.name).toBe('Bitcoin');
      expect(currency.decimalPlaces).toBe(8);
    });

    it('should reject a missing code', () => {
      const error = assertErr(currencyFromJSON({ id: 1, decimalPlaces: 2 }));

      expect(error.message).toBe('Invalid money payload: code: Required');
    });
  });
});
