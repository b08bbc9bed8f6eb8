import { getLogger } from '@fintick/logger';
import type { Result } from 'neverthrow';
import { z, type ZodError } from 'zod';

import { Currency } from '../currency.js';
import { InvalidPayloadError, type InvalidAmountError, type InvalidCurrencyError } from '../errors.js';
import { Money } from '../money.js';
import { formatZodIssues, fromZod } from '../utils/zod-utils.js';

const logger = getLogger('money-serde');

// Plain fixed-point notation only: no exponent, no float
const DECIMAL_STRING = /^-?\d+(\.\d+)?$/;

// Shape only; range and character checks belong to Currency.create
export const CurrencyJsonSchema = z.object({
  id: z.number().int(),
  code: z.string(),
  name: z.string().optional(),
  decimalPlaces: z.number().int(),
});

export const MoneyJsonSchema = z.object({
  amount: z.string().regex(DECIMAL_STRING, 'Amount must be a plain decimal string'),
  currency: CurrencyJsonSchema,
});

function toPayloadError(error: ZodError): InvalidPayloadError {
  const issues = formatZodIssues(error);
  logger.debug({ issues }, 'Rejected money payload');
  return new InvalidPayloadError(issues);
}

/**
 * Rebuild a Currency from its JSON form
 */
export function currencyFromJSON(input: unknown): Result<Currency, InvalidPayloadError | InvalidCurrencyError> {
  return fromZod(CurrencyJsonSchema, input)
    .mapErr(toPayloadError)
    .andThen((json) => Currency.create(json.id, json.code, json.name, json.decimalPlaces));
}

/**
 * Rebuild Money from the output of `money.toJSON()`. The amount is parsed from
 * its decimal string, so the round trip is exact.
 */
export function moneyFromJSON(
  input: unknown
): Result<Money, InvalidPayloadError | InvalidCurrencyError | InvalidAmountError> {
  return fromZod(MoneyJsonSchema, input)
    .mapErr(toPayloadError)
    .andThen((json) =>
      Currency.create(json.currency.id, json.currency.code, json.currency.name, json.currency.decimalPlaces).andThen(
        (currency) => Money.parse(json.amount, currency)
      )
    );
}
