import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { InvalidAmountError } from './errors.js';

/** Largest number of fractional digits a currency or rescale may request */
export const MAX_DECIMAL_PLACES = 28;

/**
 * Decimal constructor used for every amount the engine produces.
 *
 * A private clone keeps the engine independent of whatever the host application
 * sets through `Decimal.set(...)`. 50 significant digits cover 28 fractional
 * places on amounts up to 10^22.
 */
export const MoneyDecimal: Decimal.Constructor = Decimal.clone({
  precision: 50,
  rounding: Decimal.ROUND_HALF_EVEN,
  modulo: Decimal.ROUND_DOWN,
  toExpNeg: -30,
  toExpPos: 40,
});

export const ZERO = new MoneyDecimal(0);
export const HUNDRED = new MoneyDecimal(100);

/**
 * Build a Decimal from a trusted literal, e.g. `dec('10.50')`.
 * Throws on malformed input; use {@link parseDecimal} for anything user-supplied.
 */
export function dec(value: Decimal.Value): Decimal {
  return new MoneyDecimal(value);
}

/**
 * Rebind a Decimal created elsewhere to the engine's precision. Digits are
 * copied as-is.
 */
export function toMoneyDecimal(value: Decimal): Decimal {
  // Clones share one prototype, so instanceof cannot tell them apart
  return new MoneyDecimal(value);
}

// Decimal digits with an optional exponent; decimal.js would also take 0x, 0b and 0o literals
const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parse untrusted input into a finite Decimal. Strings must be decimal
 * notation, optionally with an exponent.
 */
export function parseDecimal(value: string | number | Decimal): Result<Decimal, InvalidAmountError> {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') {
      return err(new InvalidAmountError(value, 'empty string'));
    }
    if (!DECIMAL_LITERAL.test(trimmed)) {
      return err(new InvalidAmountError(value, 'not a decimal number'));
    }
  }

  let parsed: Decimal;
  try {
    parsed = new MoneyDecimal(typeof value === 'string' ? value.trim() : value);
  } catch (error) {
    return err(new InvalidAmountError(String(value), error instanceof Error ? error.message : 'Unknown error'));
  }

  if (!parsed.isFinite()) {
    return err(new InvalidAmountError(String(value), 'amount must be finite'));
  }

  return ok(parsed);
}

/**
 * `10^exponent` as an exact Decimal; `powerOfTen(-2)` is 0.01.
 */
export function powerOfTen(exponent: number): Decimal {
  return new MoneyDecimal(`1e${exponent}`);
}
