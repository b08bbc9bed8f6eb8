import { Decimal } from 'decimal.js';

import { toMoneyDecimal } from './decimal.js';

/**
 * Rounding policies.
 *
 * The three midpoint strategies round to the nearest value and only differ on
 * exact ties. The directional ones always move the same way.
 */
export const RoundingStrategy = {
  /** Ties go to the even neighbour (banker's rounding): 6.5 -> 6, 7.5 -> 8 */
  MidpointNearestEven: 'MidpointNearestEven',
  /** Ties go away from zero: 6.5 -> 7, -6.5 -> -7 */
  MidpointAwayFromZero: 'MidpointAwayFromZero',
  /** Ties go toward zero: 6.5 -> 6, -6.5 -> -6 */
  MidpointTowardZero: 'MidpointTowardZero',
  /** Truncate: 6.8 -> 6, -6.8 -> -6 */
  ToZero: 'ToZero',
  /** 6.2 -> 7, -6.2 -> -7 */
  AwayFromZero: 'AwayFromZero',
  /** Toward negative infinity: 6.8 -> 6, -6.2 -> -7 */
  Floor: 'Floor',
  /** Toward positive infinity: 6.2 -> 7, -6.8 -> -6 */
  Ceiling: 'Ceiling',
} as const;

export type RoundingStrategy = (typeof RoundingStrategy)[keyof typeof RoundingStrategy];

export const DEFAULT_ROUNDING_STRATEGY: RoundingStrategy = RoundingStrategy.MidpointNearestEven;

const DECIMAL_ROUNDING: Record<RoundingStrategy, Decimal.Rounding> = {
  MidpointNearestEven: Decimal.ROUND_HALF_EVEN,
  MidpointAwayFromZero: Decimal.ROUND_HALF_UP,
  MidpointTowardZero: Decimal.ROUND_HALF_DOWN,
  ToZero: Decimal.ROUND_DOWN,
  AwayFromZero: Decimal.ROUND_UP,
  Floor: Decimal.ROUND_FLOOR,
  Ceiling: Decimal.ROUND_CEIL,
};

// decimal.js refuses more than 1e9 decimal places
const MAX_ROUNDING_PLACES = 1e9;

export function isRoundingStrategy(value: unknown): value is RoundingStrategy {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(DECIMAL_ROUNDING, value);
}

/**
 * Map a strategy onto the decimal.js rounding mode that implements it.
 */
export function toDecimalRounding(strategy: RoundingStrategy): Decimal.Rounding {
  return DECIMAL_ROUNDING[strategy];
}

function clampPlaces(places: number): number {
  if (Number.isNaN(places)) return 0;
  return Math.min(Math.max(Math.trunc(places), 0), MAX_ROUNDING_PLACES);
}

/**
 * Round `value` to `places` fractional digits.
 *
 * Never fails: requesting more places than the value carries returns it
 * unchanged, and negative or fractional `places` are clamped to a whole number
 * of at least zero.
 */
export function round(
  value: Decimal,
  places: number,
  strategy: RoundingStrategy = DEFAULT_ROUNDING_STRATEGY
): Decimal {
  return toMoneyDecimal(value).toDecimalPlaces(clampPlaces(places), DECIMAL_ROUNDING[strategy]);
}

/**
 * Round the exact rational `dividend / divisor` to an integer.
 *
 * Works from the truncated quotient and the exact remainder instead of a
 * rounded decimal quotient, so a tie is only reported when the remainder is
 * exactly half the divisor. `divisor` must be non-zero.
 */
export function roundQuotient(dividend: Decimal, divisor: Decimal, strategy: RoundingStrategy): Decimal {
  const a = toMoneyDecimal(dividend);
  const b = toMoneyDecimal(divisor);

  const truncated = a.divToInt(b);
  const remainder = a.minus(truncated.times(b));
  if (remainder.isZero()) {
    return truncated;
  }

  const step = a.isNegative() === b.isNegative() ? 1 : -1;
  const away = truncated.plus(step);
  // <0 below the midpoint, 0 on it, >0 past it
  const half = remainder.abs().times(2).cmp(b.abs());

  switch (strategy) {
    case RoundingStrategy.ToZero:
      return truncated;
    case RoundingStrategy.AwayFromZero:
      return away;
    case RoundingStrategy.Floor:
      return step < 0 ? away : truncated;
    case RoundingStrategy.Ceiling:
      return step > 0 ? away : truncated;
    case RoundingStrategy.MidpointAwayFromZero:
      return half >= 0 ? away : truncated;
    case RoundingStrategy.MidpointTowardZero:
      return half > 0 ? away : truncated;
    case RoundingStrategy.MidpointNearestEven:
      if (half !== 0) return half > 0 ? away : truncated;
      return truncated.mod(2).isZero() ? truncated : away;
  }
}
