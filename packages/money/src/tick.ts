import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { powerOfTen, toMoneyDecimal } from './decimal.js';
import { InvalidTickSizeError } from './errors.js';
import { round, roundQuotient, type RoundingStrategy } from './rounding.js';

/**
 * If `tick` is exactly 10^-dp with dp >= 0 (0.001, 0.1, 1), return dp.
 */
export function tickPowerOfTenPlaces(tick: Decimal): number | undefined {
  if (!tick.isFinite() || tick.lte(0)) return undefined;
  const places = tick.decimalPlaces();
  return tick.eq(powerOfTen(-places)) ? places : undefined;
}

export function validateTick(tick: Decimal): Result<Decimal, InvalidTickSizeError> {
  if (!tick.isFinite()) {
    return err(new InvalidTickSizeError(`tick size must be finite, received: ${tick.toString()}`));
  }
  if (tick.isZero()) {
    return err(new InvalidTickSizeError('tick size must not be zero'));
  }
  if (tick.isNegative()) {
    return err(new InvalidTickSizeError(`tick size must be positive, received: ${tick.toFixed()}`));
  }
  return ok(toMoneyDecimal(tick));
}

/**
 * Snap `amount` onto the lattice of multiples of `tick`.
 *
 * The quotient amount / tick is rounded to an integer with `strategy` and
 * multiplied back. Power-of-ten ticks round the amount's digits directly.
 * The result is not re-rounded to any currency precision.
 */
export function quantizeToTick(
  amount: Decimal,
  tick: Decimal,
  strategy: RoundingStrategy
): Result<Decimal, InvalidTickSizeError> {
  return validateTick(tick).map((validTick) => {
    const places = tickPowerOfTenPlaces(validTick);
    if (places !== undefined) {
      return round(amount, places, strategy);
    }
    return roundQuotient(amount, validTick, strategy).times(validTick);
  });
}

/**
 * Exact check for a zero remainder. A non-positive tick is never matched.
 */
export function isMultipleOfTick(amount: Decimal, tick: Decimal): boolean {
  if (!tick.isFinite() || tick.lte(0)) return false;
  return toMoneyDecimal(amount).mod(tick).isZero();
}
